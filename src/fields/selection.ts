/**
 * Which fields of the current index exist, which the operator shows, and in
 * what order.
 *
 * Invariant after every public call: selected ⊆ discovered, and the display
 * order holds each selected field exactly once. Every method is synchronous,
 * so no caller can observe the state between two related updates.
 */

import { collectFieldSet } from "./documents";
import type { SearchDocument } from "./types";

function sameMembers(a: ReadonlySet<string>, b: ReadonlySet<string>): boolean {
  if (a.size !== b.size) return false;
  for (const field of a) {
    if (!b.has(field)) return false;
  }
  return true;
}

export class FieldSelectionState {
  private discovered = new Set<string>();
  private readonly selected = new Set<string>();
  private fieldOrder: string[] = [];
  private currentFilter = "";
  private filteredFields: string[] = [];

  /**
   * Replace the discovered fields with those found in a batch of documents.
   * Returns whether anything changed. An empty batch changes nothing.
   */
  updateFromDocuments(docs: readonly SearchDocument[]): boolean {
    if (docs.length === 0) return false;

    const next = collectFieldSet(docs);
    if (sameMembers(next, this.discovered)) return false;

    this.discovered = next;
    for (const field of [...this.selected]) {
      if (!next.has(field)) this.selected.delete(field);
    }
    this.fieldOrder = this.fieldOrder.filter((field) => next.has(field));
    this.refreshFiltered();
    return true;
  }

  /**
   * Returns false when the field is unknown or already selected.
   */
  selectField(field: string): boolean {
    if (!this.discovered.has(field) || this.selected.has(field)) return false;
    this.selected.add(field);
    this.fieldOrder.push(field);
    this.refreshFiltered();
    return true;
  }

  unselectField(field: string): boolean {
    if (!this.selected.delete(field)) return false;
    this.fieldOrder = this.fieldOrder.filter((f) => f !== field);
    this.refreshFiltered();
    return true;
  }

  toggleField(field: string): boolean {
    return this.selected.has(field) ? this.unselectField(field) : this.selectField(field);
  }

  /**
   * Swap a selected field with its neighbour. Returns whether a swap happened.
   */
  moveField(field: string, up: boolean): boolean {
    const pos = this.fieldOrder.indexOf(field);
    if (pos === -1) return false;

    const target = up ? pos - 1 : pos + 1;
    if (target < 0 || target >= this.fieldOrder.length) return false;

    const order = [...this.fieldOrder];
    [order[pos], order[target]] = [order[target], order[pos]];
    this.fieldOrder = order;
    return true;
  }

  /**
   * Unselected fields whose name contains `substring` (case-insensitive), sorted.
   */
  applyFilter(substring: string): string[] {
    this.currentFilter = substring;
    this.refreshFiltered();
    return [...this.filteredFields];
  }

  getFilteredFields(): string[] {
    return [...this.filteredFields];
  }

  getCurrentFilter(): string {
    return this.currentFilter;
  }

  getOrderedSelectedFields(): string[] {
    return [...this.fieldOrder];
  }

  isFieldSelected(field: string): boolean {
    return this.selected.has(field);
  }

  getDiscoveredFields(): string[] {
    return [...this.discovered].sort();
  }

  reset(): void {
    this.discovered = new Set();
    this.selected.clear();
    this.fieldOrder = [];
    this.currentFilter = "";
    this.filteredFields = [];
  }

  private refreshFiltered(): void {
    const needle = this.currentFilter.toLowerCase();
    this.filteredFields = [...this.discovered]
      .filter((field) => !this.selected.has(field) && field.toLowerCase().includes(needle))
      .sort();
  }
}
