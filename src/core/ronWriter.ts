import { z } from 'zod';
import type { RonDocument, RonValue } from './ron';

export const ronWriterOptionsSchema = z.object({
  /** Spaces per nesting level. */
  indent: z.number().int().min(0).max(8).default(4),
  /** Struct-free values shorter than this are kept on one line. */
  maxInlineWidth: z.number().int().positive().default(72),
});

export type RonWriterOptions = z.input<typeof ronWriterOptionsSchema>;
type ResolvedWriterOptions = z.output<typeof ronWriterOptionsSchema>;

export function formatRonNumber(value: number, float: boolean): string {
  if (!Number.isFinite(value)) {
    throw new RangeError(`Cannot write non-finite number ${value}`);
  }
  if (!float) return BigInt(Math.trunc(value)).toString();
  if (Object.is(value, -0)) return '-0.';
  const text = String(value);
  // Exponent forms already read back as floats.
  return Number.isInteger(value) && !text.includes('e') ? `${text}.` : text;
}

export function quoteRonString(value: string): string {
  let out = '"';
  for (const ch of value) {
    switch (ch) {
      case '"':
        out += '\\"';
        break;
      case '\\':
        out += '\\\\';
        break;
      case '\n':
        out += '\\n';
        break;
      case '\t':
        out += '\\t';
        break;
      case '\r':
        out += '\\r';
        break;
      case '\0':
        out += '\\0';
        break;
      default: {
        const cp = ch.codePointAt(0) ?? 0;
        out += cp < 0x20 ? `\\u{${cp.toString(16)}}` : ch;
      }
    }
  }
  return out + '"';
}

function containsStruct(v: RonValue): boolean {
  switch (v.kind) {
    case 'struct':
      return true;
    case 'list':
    case 'tuple':
      return v.items.some(containsStruct);
    case 'map':
      return v.entries.some((e) => containsStruct(e.key) || containsStruct(e.value));
    default:
      return false;
  }
}

function renderInline(v: RonValue): string {
  switch (v.kind) {
    case 'number':
      return formatRonNumber(v.value, v.float);
    case 'string':
      return quoteRonString(v.value);
    case 'bool':
      return v.value ? 'true' : 'false';
    case 'unit':
      return '()';
    case 'ident':
      return v.name;
    case 'list':
      return `[${v.items.map(renderInline).join(', ')}]`;
    case 'map':
      return `{${v.entries.map((e) => `${renderInline(e.key)}: ${renderInline(e.value)}`).join(', ')}}`;
    case 'tuple':
      return `${v.name ?? ''}(${v.items.map(renderInline).join(', ')})`;
    case 'struct':
      return `${v.name ?? ''}(${v.fields.map((f) => `${f.name}: ${renderInline(f.value)}`).join(', ')})`;
  }
}

function render(v: RonValue, depth: number, opts: ResolvedWriterOptions): string {
  if (!containsStruct(v)) {
    const inline = renderInline(v);
    if (inline.length <= opts.maxInlineWidth) return inline;
  }
  const pad = ' '.repeat(opts.indent * (depth + 1));
  const close = ' '.repeat(opts.indent * depth);
  const block = (open: string, lines: string[], end: string) =>
    lines.length === 0 ? `${open}${end}` : `${open}\n${lines.map((l) => `${pad}${l},\n`).join('')}${close}${end}`;

  switch (v.kind) {
    case 'list':
      return block('[', v.items.map((i) => render(i, depth + 1, opts)), ']');
    case 'map':
      return block(
        '{',
        v.entries.map((e) => `${render(e.key, depth + 1, opts)}: ${render(e.value, depth + 1, opts)}`),
        '}',
      );
    case 'tuple':
      return block(`${v.name ?? ''}(`, v.items.map((i) => render(i, depth + 1, opts)), ')');
    case 'struct':
      return block(
        `${v.name ?? ''}(`,
        v.fields.map((f) => `${f.name}: ${render(f.value, depth + 1, opts)}`),
        ')',
      );
    default:
      return renderInline(v);
  }
}

export function stringifyRon(value: RonValue, options: RonWriterOptions = {}): string {
  return render(value, 0, ronWriterOptionsSchema.parse(options));
}

export function stringifyRonDocument(doc: RonDocument, options: RonWriterOptions = {}): string {
  const header = doc.attributes
    .map((a) => (a.args.length > 0 ? `#![${a.name}(${a.args.join(', ')})]\n` : `#![${a.name}]\n`))
    .join('');
  return `${header}${stringifyRon(doc.value, options)}\n`;
}
