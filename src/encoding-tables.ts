// src/encoding-tables.ts - registry of lookup tables, one namespace per representation
//
// Tree view:
//   unicode
//     greek  -> { description, mapping }
//     math   -> { description, mapping }
//   latex
//     greek  -> ...
//
// The registry is created once by the application context and shared by every
// encoder. Population happens at startup; afterwards it is read-mostly.

import { TableNotFoundError, InvalidKeyError } from './errors';
import type { Representation } from './representation';

/** Key to code mapping, as accepted by `installTable`. */
export type Mapping = ReadonlyMap<string, string> | Readonly<Record<string, string>>;

export interface EncodingTable {
  description: string;
  mapping: ReadonlyMap<string, string>;
}

function isMap(mapping: Mapping): mapping is ReadonlyMap<string, string> {
  return mapping instanceof Map;
}

function toMap(mapping: Mapping): Map<string, string> {
  if (isMap(mapping)) {
    return new Map(mapping);
  }
  return new Map(Object.entries(mapping));
}

export class EncodingTables {
  private readonly installed = new Map<Representation, Map<string, EncodingTable>>();
  private readonly marks = new Map<Representation, Set<string>>();

  private namespace(representation: Representation): Map<string, EncodingTable> {
    let tables = this.installed.get(representation);
    if (!tables) {
      tables = new Map();
      this.installed.set(representation, tables);
      this.marks.set(representation, new Set());
    }
    return tables;
  }

  /** Insert a table, replacing any table already installed under the same id. */
  installTable(representation: Representation, tableId: string, description: string, mapping: Mapping): void {
    this.namespace(representation).set(tableId, { description, mapping: toMap(mapping) });
  }

  uninstallTable(representation: Representation, tableId: string): boolean {
    return this.installed.get(representation)?.delete(tableId) ?? false;
  }

  hasRepresentation(representation: Representation): boolean {
    return this.installed.has(representation);
  }

  hasTable(representation: Representation, tableId: string): boolean {
    return this.installed.get(representation)?.has(tableId) ?? false;
  }

  getTable(representation: Representation, tableId: string): EncodingTable {
    const tables = this.installed.get(representation);
    const table = tables?.get(tableId);
    if (!table) {
      throw new TableNotFoundError(representation, tableId, tables !== undefined);
    }
    return table;
  }

  getDescription(representation: Representation, tableId: string): string {
    return this.getTable(representation, tableId).description;
  }

  getMapping(representation: Representation, tableId: string): ReadonlyMap<string, string> {
    return this.getTable(representation, tableId).mapping;
  }

  getMapped(representation: Representation, tableId: string, key: string): string {
    const code = this.getMapping(representation, tableId).get(key);
    if (code === undefined) {
      throw new InvalidKeyError(representation, tableId, key);
    }
    return code;
  }

  // -------------------------------------------------------------------------
  // Nonspacing marks
  // -------------------------------------------------------------------------

  setNonspacingMarks(representation: Representation, marks: Iterable<string>): void {
    this.namespace(representation);
    this.marks.set(representation, new Set(marks));
  }

  getNonspacingMarks(representation: Representation): readonly string[] {
    return [...(this.marks.get(representation) ?? [])];
  }

  isNonspacingMark(representation: Representation, unit: string): boolean {
    return this.marks.get(representation)?.has(unit) ?? false;
  }

  /**
   * Count the code points of `text` that combine with the previous position
   * instead of advancing it. Only display-width arithmetic depends on this.
   */
  countNonspacingMarks(representation: Representation, text: string): number {
    const marks = this.marks.get(representation);
    if (!marks || marks.size === 0) {
      return 0;
    }
    let count = 0;
    for (const unit of text) {
      if (marks.has(unit)) {
        count++;
      }
    }
    return count;
  }

  hasLeadingNonspacingMark(representation: Representation, text: string): boolean {
    const first = text.codePointAt(0);
    return first !== undefined && this.isNonspacingMark(representation, String.fromCodePoint(first));
  }

  // -------------------------------------------------------------------------
  // Introspection
  // -------------------------------------------------------------------------

  listTables(representation: Representation): string[] {
    return [...(this.installed.get(representation)?.keys() ?? [])];
  }

  listRepresentations(): Representation[] {
    return [...this.installed.keys()];
  }
}
