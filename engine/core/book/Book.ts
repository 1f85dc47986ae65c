/**
 * Sheetgrid Engine - Book
 *
 * An ordered collection of named sheets. Sheets added to a book share their
 * backing rows with the matrix they came from; nothing is deep-copied.
 */

import { randomUUID } from 'node:crypto';
import {
  DEFAULT_BOOK_FILENAME,
  Grid,
  GridInput,
} from '../types/index.js';
import { DataTypeMismatchError } from '../errors/index.js';
import { Matrix } from '../matrix/Matrix.js';

export interface BookConfig {
  /** Name the book contributes under when it holds a single sheet */
  filename?: string;
}

export type SheetSource =
  | Record<string, GridInput>
  | Map<string, GridInput>;

export class Book {
  private sheets: Map<string, Matrix> = new Map();
  private config: Required<BookConfig>;

  constructor(sheets: SheetSource = {}, config: BookConfig = {}) {
    this.config = {
      filename: config.filename ?? DEFAULT_BOOK_FILENAME,
    };
    this.loadFromSheets(sheets);
  }

  get filename(): string {
    return this.config.filename;
  }

  /**
   * Replace the book's content. Each array becomes a sheet's store.
   */
  loadFromSheets(sheets: SheetSource): void {
    const entries = sheets instanceof Map ? [...sheets.entries()] : Object.entries(sheets);
    this.sheets = new Map();
    for (const [name, array] of entries) {
      this.sheets.set(name, new Matrix(array, { name }));
    }
  }

  numberOfSheets(): number {
    return this.sheets.size;
  }

  sheetNames(): string[] {
    return [...this.sheets.keys()];
  }

  sheetByName(name: string): Matrix | null {
    return this.sheets.get(name) ?? null;
  }

  /**
   * Live store of every sheet, by name, in insertion order.
   */
  toDict(): Map<string, Grid> {
    const result = new Map<string, Grid>();
    for (const [name, sheet] of this.sheets) {
      result.set(name, sheet.getInternalArray());
    }
    return result;
  }

  /**
   * New book holding this book's sheets followed by `other`.
   */
  add(other: Matrix | Book): Book {
    return addSheets(this, other);
  }
}

function uniqueName(content: Map<string, Grid>, preferred: string, base: string): string {
  let name = preferred;
  while (content.has(name)) {
    name = `${base}_${randomUUID().replace(/-/g, '')}`;
  }
  return name;
}

/**
 * Combine a sheet or book with another into a new book.
 *
 * Existing names are never overwritten: on a clash the incoming sheet is
 * renamed `<name>_<uuid>`. A single-sheet book on the right contributes its
 * sheet under the book's filename. Backing arrays are shared, not copied.
 */
export function addSheets(left: Matrix | Book, right: Matrix | Book): Book {
  const content = new Map<string, Grid>();

  if (left instanceof Book) {
    for (const [name, array] of left.toDict()) {
      content.set(name, array);
    }
  } else {
    content.set(left.name, left.getInternalArray());
  }

  if (right instanceof Book) {
    const incoming = right.toDict();
    for (const [name, array] of incoming) {
      const preferred = incoming.size === 1 ? right.filename : name;
      content.set(uniqueName(content, preferred, name), array);
    }
  } else if (right instanceof Matrix) {
    content.set(uniqueName(content, right.name, right.name), right.getInternalArray());
  } else {
    throw new DataTypeMismatchError('Only a Matrix or a Book can be added');
  }

  return new Book(content);
}
