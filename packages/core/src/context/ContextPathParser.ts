/**
 * Context Path Parser
 *
 * Parses the compact annotation grammar describing a chain of map/list
 * navigation steps:
 *
 * ```
 * a.b.'10'.{#5}.{='1'}.[-1].[#100].[=20]
 * ```
 *
 * - plain or quoted segment: map key (bare integers become integer keys)
 * - `{N}` / `[N]`: map / list index
 * - `{#N}` / `[#N]`: map / list rank
 * - `{=V}` / `[=V]`: map / list value (V may be quoted)
 *
 * Single left-to-right pass; the first malformed step aborts the parse.
 *
 * @module context/ContextPathParser
 */

import { InvalidContextSyntaxError } from '../errors';
import {
  Ctx,
  parseInteger,
  type ContextPath,
  type ContextStep,
  type ContextValue,
} from './ContextPath';

type BracketKind = 'map' | 'list';

const CLOSING: Record<string, string> = { '{': '}', '[': ']' };
const RESERVED = new Set(['{', '}', '[', ']', "'", '"', '\\']);

function fail(message: string): never {
  throw new InvalidContextSyntaxError(`Context DSL: ${message}`);
}

function isQuote(ch: string): boolean {
  return ch === "'" || ch === '"';
}

class Scanner {
  pos = 0;

  constructor(private readonly input: string) {}

  get done(): boolean {
    return this.pos >= this.input.length;
  }

  peek(offset = 0): string {
    return this.input.charAt(this.pos + offset);
  }

  parse(): ContextStep[] {
    const steps: ContextStep[] = [];
    if (this.input.length === 0) return steps;

    for (;;) {
      if (this.done || this.peek() === '.') {
        fail(`string '${this.input}' contains empty context at position ${this.pos}`);
      }
      steps.push(this.segment());
      if (this.done) return steps;
      if (this.peek() !== '.') {
        fail(`unexpected character '${this.peek()}' at position ${this.pos}`);
      }
      this.pos++;
    }
  }

  private segment(): ContextStep {
    const ch = this.peek();
    if (ch === '{' || ch === '[') return this.bracket(ch === '{' ? 'map' : 'list');
    if (isQuote(ch)) return Ctx.mapKey(this.quoted());
    return Ctx.mapKey(this.bareKey());
  }

  private bareKey(): ContextValue {
    const start = this.pos;
    while (!this.done && this.peek() !== '.') {
      if (RESERVED.has(this.peek())) {
        fail(`unexpected character '${this.peek()}' at position ${this.pos}`);
      }
      this.pos++;
    }
    const token = this.input.slice(start, this.pos);
    return parseInteger(token) ?? token;
  }

  /** Reads a quoted token starting at the opening quote; honours backslash escapes. */
  private quoted(): string {
    const start = this.pos;
    const q = this.peek();
    let out = '';
    this.pos++;
    while (!this.done) {
      const ch = this.peek();
      if (ch === '\\') {
        if (this.pos + 1 >= this.input.length) break;
        out += this.peek(1);
        this.pos += 2;
        continue;
      }
      this.pos++;
      if (ch === q) return out;
      out += ch;
    }
    return fail(`unterminated quote starting at position ${start}`);
  }

  private bracket(kind: BracketKind): ContextStep {
    const open = this.peek();
    const close = CLOSING[open];
    this.pos++;

    if (this.peek() === close) {
      fail(`string '${open}${close}' has no content`);
    }

    const marker = this.peek();
    if (marker === '=') {
      this.pos++;
      return this.valueStep(kind, open, close);
    }

    const tokenStart = marker === '#' ? this.pos + 1 : this.pos;
    const content = this.readUntilClose(close);
    const token = marker === '#' ? content.slice(1) : content;
    const payloadKind = marker === '#' ? 'rank' : 'index';
    const value = parseInteger(token);
    if (value === undefined) {
      throw new InvalidContextSyntaxError(
        `Context DSL ${kind} ${payloadKind} at position ${tokenStart}: ` +
          `expecting only integer values, got '${token}' instead`
      );
    }

    if (kind === 'map') {
      return payloadKind === 'rank' ? Ctx.mapRank(value) : Ctx.mapIndex(value);
    }
    return payloadKind === 'rank' ? Ctx.listRank(value) : Ctx.listIndex(value);
  }

  private valueStep(kind: BracketKind, open: string, close: string): ContextStep {
    let value: ContextValue;
    if (isQuote(this.peek())) {
      value = this.quoted();
      this.expectClose(close);
    } else {
      const token = this.readUntilClose(close);
      if (token.length === 0) {
        fail(`string '${open}=${close}' has no content`);
      }
      value = parseInteger(token) ?? token;
    }
    return kind === 'map' ? Ctx.mapValue(value) : Ctx.listValue(value);
  }

  /** Consumes content up to and including the matching closing bracket. */
  private readUntilClose(close: string): string {
    const start = this.pos;
    while (!this.done) {
      const ch = this.peek();
      if (ch === '}' || ch === ']') {
        const content = this.input.slice(start, this.pos);
        this.expectClose(close);
        return content;
      }
      this.pos++;
    }
    return fail(`brackets mismatch, expecting '${close}', got end of input instead`);
  }

  private expectClose(close: string): void {
    if (this.done) {
      fail(`brackets mismatch, expecting '${close}', got end of input instead`);
    }
    const ch = this.peek();
    if (ch !== close) {
      if (ch === '}' || ch === ']') {
        fail(`brackets mismatch, expecting '${close}', got '${ch}' instead`);
      }
      fail(`unexpected character '${ch}' at position ${this.pos}`);
    }
    this.pos++;
  }
}

/**
 * Parses an annotation context string into a frozen context path.
 * The empty string yields an empty path.
 *
 * @throws InvalidContextSyntaxError on the first malformed step
 */
export function parseContextPath(dsl: string): ContextPath {
  return Object.freeze(new Scanner(dsl).parse());
}
