import type { RonAttribute } from '../types';
import { RonSyntaxError } from './errors';

export type RonField = { name: string; value: RonValue };
export type RonMapEntry = { key: RonValue; value: RonValue };

/**
 * Generic syntax tree for a RON value. Named structs and tuple variants keep
 * their name; anonymous ones leave it undefined.
 */
export type RonValue =
  | { kind: 'number'; value: number; float: boolean }
  | { kind: 'string'; value: string }
  | { kind: 'bool'; value: boolean }
  | { kind: 'unit' }
  | { kind: 'ident'; name: string }
  | { kind: 'list'; items: RonValue[] }
  | { kind: 'map'; entries: RonMapEntry[] }
  | { kind: 'tuple'; name?: string; items: RonValue[] }
  | { kind: 'struct'; name?: string; fields: RonField[] };

export type RonDocument = {
  attributes: RonAttribute[];
  value: RonValue;
};

const IDENT_RE = /[A-Za-z_][A-Za-z0-9_]*/y;
const NUMBER_RE = /[+-]?(?:\d[\d_]*\.?\d*|\.\d+)(?:[eE][+-]?\d+)?/y;

class RonParser {
  private pos = 0;

  constructor(private readonly src: string) {}

  parseDocument(): RonDocument {
    const attributes: RonAttribute[] = [];
    this.skipTrivia();
    while (this.peek() === '#') {
      attributes.push(this.parseAttribute());
      this.skipTrivia();
    }
    const value = this.parseValue();
    this.skipTrivia();
    if (this.pos < this.src.length) this.fail(`Unexpected '${this.peek()}' after document`);
    return { attributes, value };
  }

  private parseAttribute(): RonAttribute {
    this.expect('#');
    this.expect('!');
    this.expect('[');
    this.skipTrivia();
    const name = this.readIdent();
    const args: string[] = [];
    this.skipTrivia();
    if (this.peek() === '(') {
      this.pos++;
      this.skipTrivia();
      while (this.peek() !== ')') {
        args.push(this.readIdent());
        this.skipTrivia();
        if (this.peek() === ',') {
          this.pos++;
          this.skipTrivia();
        } else if (this.peek() !== ')') {
          this.fail("Expected ',' or ')' in attribute");
        }
      }
      this.pos++;
      this.skipTrivia();
    }
    this.expect(']');
    return { name, args };
  }

  private parseValue(): RonValue {
    this.skipTrivia();
    const c = this.peek();
    if (c === '') this.fail('Unexpected end of input');
    if (c === '"') return { kind: 'string', value: this.readString() };
    if (c === '[') return this.parseList();
    if (c === '{') return this.parseMap();
    if (c === '(') return this.parseParenthesized(undefined);
    if (/[0-9.+-]/.test(c)) return this.parseNumber();
    if (/[A-Za-z_]/.test(c)) {
      const name = this.readIdent();
      if (name === 'true' || name === 'false') return { kind: 'bool', value: name === 'true' };
      this.skipTrivia();
      if (this.peek() === '(') return this.parseParenthesized(name);
      return { kind: 'ident', name };
    }
    return this.fail(`Unexpected '${c}'`);
  }

  private parseNumber(): RonValue {
    NUMBER_RE.lastIndex = this.pos;
    const m = NUMBER_RE.exec(this.src);
    if (!m) return this.fail('Malformed number');
    const raw = m[0];
    this.pos += raw.length;
    const value = Number(raw.replace(/_/g, ''));
    if (Number.isNaN(value)) this.fail(`Malformed number '${raw}'`);
    if (!Number.isFinite(value)) {
      this.pos -= raw.length;
      this.fail(`Number '${raw}' is out of range`);
    }
    return { kind: 'number', value, float: /[.eE]/.test(raw) };
  }

  private parseList(): RonValue {
    this.expect('[');
    const items: RonValue[] = [];
    this.parseSequence(']', () => items.push(this.parseValue()));
    return { kind: 'list', items };
  }

  private parseMap(): RonValue {
    this.expect('{');
    const entries: RonMapEntry[] = [];
    this.parseSequence('}', () => {
      const key = this.parseValue();
      this.skipTrivia();
      this.expect(':');
      entries.push({ key, value: this.parseValue() });
    });
    return { kind: 'map', entries };
  }

  /** `(...)` after an optional name: unit, struct with named fields, or tuple. */
  private parseParenthesized(name: string | undefined): RonValue {
    this.expect('(');
    this.skipTrivia();
    if (this.peek() === ')') {
      this.pos++;
      return name === undefined ? { kind: 'unit' } : { kind: 'tuple', name, items: [] };
    }
    if (this.startsField()) {
      const fields: RonField[] = [];
      const seen = new Set<string>();
      this.parseSequence(')', () => {
        const fieldName = this.readIdent();
        if (seen.has(fieldName)) this.fail(`Duplicate field '${fieldName}'`);
        seen.add(fieldName);
        this.skipTrivia();
        this.expect(':');
        fields.push({ name: fieldName, value: this.parseValue() });
      });
      return { kind: 'struct', name, fields };
    }
    const items: RonValue[] = [];
    this.parseSequence(')', () => items.push(this.parseValue()));
    return { kind: 'tuple', name, items };
  }

  private parseSequence(close: string, item: () => void): void {
    for (;;) {
      this.skipTrivia();
      if (this.peek() === close) {
        this.pos++;
        return;
      }
      item();
      this.skipTrivia();
      const c = this.peek();
      if (c === ',') {
        this.pos++;
      } else if (c !== close) {
        this.fail(`Expected ',' or '${close}'`);
      }
    }
  }

  private startsField(): boolean {
    IDENT_RE.lastIndex = this.pos;
    const m = IDENT_RE.exec(this.src);
    if (!m) return false;
    let i = this.pos + m[0].length;
    while (i < this.src.length && /\s/.test(this.src.charAt(i))) i++;
    return this.src.charAt(i) === ':';
  }

  private readIdent(): string {
    IDENT_RE.lastIndex = this.pos;
    const m = IDENT_RE.exec(this.src);
    if (!m) return this.fail('Expected identifier');
    this.pos += m[0].length;
    return m[0];
  }

  private readString(): string {
    this.expect('"');
    let out = '';
    for (;;) {
      const c = this.src.charAt(this.pos);
      if (c === '') this.fail('Unterminated string');
      this.pos++;
      if (c === '"') return out;
      if (c !== '\\') {
        out += c;
        continue;
      }
      const e = this.src.charAt(this.pos);
      this.pos++;
      switch (e) {
        case '"':
        case '\\':
        case '/':
        case "'":
          out += e;
          break;
        case 'n':
          out += '\n';
          break;
        case 't':
          out += '\t';
          break;
        case 'r':
          out += '\r';
          break;
        case '0':
          out += '\0';
          break;
        case 'u':
          out += this.readUnicodeEscape();
          break;
        default:
          this.fail(`Unknown escape '\\${e}'`);
      }
    }
  }

  private readUnicodeEscape(): string {
    let hex: string;
    if (this.peek() === '{') {
      const end = this.src.indexOf('}', this.pos);
      if (end < 0) return this.fail('Unterminated unicode escape');
      hex = this.src.slice(this.pos + 1, end);
      this.pos = end + 1;
    } else {
      hex = this.src.slice(this.pos, this.pos + 4);
      this.pos += 4;
    }
    const cp = parseInt(hex, 16);
    if (!/^[0-9a-fA-F]{1,6}$/.test(hex) || cp > 0x10ffff) {
      this.fail(`Invalid unicode escape '${hex}'`);
    }
    return String.fromCodePoint(cp);
  }

  private skipTrivia(): void {
    for (;;) {
      const c = this.src.charAt(this.pos);
      if (c === ' ' || c === '\t' || c === '\n' || c === '\r') {
        this.pos++;
      } else if (this.src.startsWith('//', this.pos)) {
        const nl = this.src.indexOf('\n', this.pos);
        this.pos = nl < 0 ? this.src.length : nl + 1;
      } else if (this.src.startsWith('/*', this.pos)) {
        this.skipBlockComment();
      } else {
        return;
      }
    }
  }

  // Block comments nest.
  private skipBlockComment(): void {
    const start = this.pos;
    let depth = 0;
    do {
      if (this.pos >= this.src.length) {
        this.pos = start;
        this.fail('Unterminated block comment');
      }
      if (this.src.startsWith('/*', this.pos)) {
        depth++;
        this.pos += 2;
      } else if (this.src.startsWith('*/', this.pos)) {
        depth--;
        this.pos += 2;
      } else {
        this.pos++;
      }
    } while (depth > 0);
  }

  private peek(): string {
    return this.src.charAt(this.pos);
  }

  private expect(c: string): void {
    if (this.peek() !== c) {
      const found = this.peek() === '' ? 'end of input' : `'${this.peek()}'`;
      this.fail(`Expected '${c}' but found ${found}`);
    }
    this.pos++;
  }

  private fail(message: string): never {
    let line = 1;
    let lineStart = 0;
    for (let i = 0; i < this.pos && i < this.src.length; i++) {
      if (this.src.charAt(i) === '\n') {
        line++;
        lineStart = i + 1;
      }
    }
    throw new RonSyntaxError(message, line, this.pos - lineStart + 1);
  }
}

export function parseRon(source: string): RonDocument {
  return new RonParser(source).parseDocument();
}

