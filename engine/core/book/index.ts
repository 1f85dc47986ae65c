/**
 * Sheetgrid Engine - Book Module Exports
 */

export { Book, addSheets } from './Book.js';
export type { BookConfig, SheetSource } from './Book.js';
