/**
 * Context Path Types
 *
 * A context path is an ordered chain of map/list navigation steps used to
 * address a value nested inside a bin (map key, map rank, list index ...).
 *
 * @module context/ContextPath
 */

export type ContextValue = string | number;

/** Steps addressing an element by position or by rank. */
export type PositionalStepKind = 'mapIndex' | 'mapRank' | 'listIndex' | 'listRank';

/** Steps addressing an element by key or by value. */
export type KeyedStepKind = 'mapKey' | 'mapValue' | 'listValue';

export type ContextStepKind = PositionalStepKind | KeyedStepKind;

export interface PositionalStep {
  readonly kind: PositionalStepKind;
  readonly value: number;
}

export interface KeyedStep {
  readonly kind: KeyedStepKind;
  readonly value: ContextValue;
}

export type ContextStep = PositionalStep | KeyedStep;

export type ContextPath = readonly ContextStep[];

export const EMPTY_CONTEXT: ContextPath = Object.freeze([]);

export function isPositionalKind(kind: ContextStepKind): kind is PositionalStepKind {
  return kind === 'mapIndex' || kind === 'mapRank' || kind === 'listIndex' || kind === 'listRank';
}

function step<S extends ContextStep>(s: S): S {
  return Object.freeze(s);
}

/**
 * Step factories.
 *
 * @example
 * ```typescript
 * const path = [Ctx.mapKey('address'), Ctx.listIndex(-1)];
 * formatContextPath(path); // "address.[-1]"
 * ```
 */
export const Ctx = {
  mapKey: (value: ContextValue): KeyedStep => step({ kind: 'mapKey', value }),
  mapValue: (value: ContextValue): KeyedStep => step({ kind: 'mapValue', value }),
  mapIndex: (value: number): PositionalStep => step({ kind: 'mapIndex', value }),
  mapRank: (value: number): PositionalStep => step({ kind: 'mapRank', value }),
  listValue: (value: ContextValue): KeyedStep => step({ kind: 'listValue', value }),
  listIndex: (value: number): PositionalStep => step({ kind: 'listIndex', value }),
  listRank: (value: number): PositionalStep => step({ kind: 'listRank', value }),
} as const;

const INTEGER_PATTERN = /^-?\d+$/;
const BARE_KEY_PATTERN = /^[^.'"{}[\]\\]+$/;

/**
 * Parses a token as an integer, returning undefined for anything that is
 * not a plain (safe) integer literal.
 */
export function parseInteger(token: string): number | undefined {
  if (!INTEGER_PATTERN.test(token)) return undefined;
  const value = Number(token);
  return Number.isSafeInteger(value) ? value : undefined;
}

function quote(value: string): string {
  return `'${value.replace(/\\/g, '\\\\').replace(/'/g, "\\'")}'`;
}

function formatKey(value: ContextValue): string {
  if (typeof value === 'number') return String(value);
  if (BARE_KEY_PATTERN.test(value) && parseInteger(value) === undefined) return value;
  return quote(value);
}

function formatValue(value: ContextValue): string {
  return typeof value === 'number' ? String(value) : quote(value);
}

/**
 * Renders a single step in annotation syntax.
 */
export function formatContextStep(s: ContextStep): string {
  switch (s.kind) {
    case 'mapKey':
      return formatKey(s.value);
    case 'mapIndex':
      return `{${s.value}}`;
    case 'mapRank':
      return `{#${s.value}}`;
    case 'mapValue':
      return `{=${formatValue(s.value)}}`;
    case 'listIndex':
      return `[${s.value}]`;
    case 'listRank':
      return `[#${s.value}]`;
    case 'listValue':
      return `[=${formatValue(s.value)}]`;
  }
}

/**
 * Renders a context path back to the annotation grammar. The output parses
 * to an equal path, so it doubles as the canonical key of the path.
 */
export function formatContextPath(path: ContextPath): string {
  return path.map(formatContextStep).join('.');
}

export function contextPathsEqual(a: ContextPath, b: ContextPath): boolean {
  if (a.length !== b.length) return false;
  return a.every((s, i) => s.kind === b[i].kind && s.value === b[i].value);
}
