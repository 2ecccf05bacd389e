import type { ChunkMetadata } from './types';

export type FilterField = 'projectId' | 'documentId';

export type FilterExpr =
  | { kind: 'eq'; field: FilterField; value: string }
  | { kind: 'in'; field: FilterField; values: string[] }
  | { kind: 'and'; clauses: FilterExpr[] };

export type PineconeFilter = Record<string, unknown>;

export const eq = (field: FilterField, value: string): FilterExpr => ({ kind: 'eq', field, value });

export const isIn = (field: FilterField, values: string[]): FilterExpr => ({ kind: 'in', field, values });

export const and = (...clauses: FilterExpr[]): FilterExpr => ({ kind: 'and', clauses });

/** Project scope, narrowed to `documentIds` when that list is non-empty. */
export function scopeFilter(projectId: string, documentIds?: readonly string[]): FilterExpr {
  const project = eq('projectId', projectId);
  if (!documentIds || documentIds.length === 0) {
    return project;
  }
  return and(project, isIn('documentId', [...new Set(documentIds)]));
}

export function toPineconeFilter(expr: FilterExpr): PineconeFilter {
  switch (expr.kind) {
    case 'eq':
      return { [expr.field]: { $eq: expr.value } };
    case 'in':
      return { [expr.field]: { $in: expr.values } };
    case 'and':
      return { $and: expr.clauses.map(toPineconeFilter) };
  }
}

export function matchesFilter(expr: FilterExpr, metadata: ChunkMetadata): boolean {
  switch (expr.kind) {
    case 'eq':
      return metadata[expr.field] === expr.value;
    case 'in':
      return expr.values.includes(metadata[expr.field]);
    case 'and':
      return expr.clauses.every(clause => matchesFilter(clause, metadata));
  }
}
