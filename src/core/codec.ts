import type {
  AssetRef,
  ButtonSpec,
  Color,
  LayoutDocument,
  LayoutNode,
  Stretch,
  TextSpec,
  Transform,
  UiImage,
} from '../types';
import { LayoutDecodeError } from './errors';
import { parseRon, type RonDocument, type RonField, type RonValue } from './ron';
import { stringifyRonDocument, type RonWriterOptions } from './ronWriter';
import { layoutNodeSchema } from './schema';

export type PlainValue = null | number | string | boolean | PlainValue[] | { [key: string]: PlainValue };

/**
 * Lower a RON value into the plain form the zod schemas read.
 * `Some(x)` unwraps to `x`; struct fields set to `None` are dropped.
 */
export function toPlain(v: RonValue): PlainValue {
  switch (v.kind) {
    case 'number':
    case 'string':
    case 'bool':
      return v.value;
    case 'unit':
      return null;
    case 'ident':
      return v.name === 'None' ? null : v.name;
    case 'list':
      return v.items.map(toPlain);
    case 'map': {
      const out: { [key: string]: PlainValue } = {};
      for (const e of v.entries) {
        const key = toPlain(e.key);
        out[typeof key === 'string' ? key : JSON.stringify(key)] = toPlain(e.value);
      }
      return out;
    }
    case 'tuple': {
      const first = v.items[0];
      if (v.name === 'Some' && v.items.length === 1 && first) return toPlain(first);
      const items = v.items.map(toPlain);
      return v.name === undefined ? items : { $tag: v.name, $items: items };
    }
    case 'struct': {
      const out: { [key: string]: PlainValue } = v.name === undefined ? {} : { $tag: v.name };
      for (const f of v.fields) {
        if (f.value.kind === 'ident' && f.value.name === 'None') continue;
        out[f.name] = toPlain(f.value);
      }
      return out;
    }
  }
}

export function decodeLayout(doc: RonDocument): LayoutDocument {
  const result = layoutNodeSchema.safeParse(toPlain(doc.value));
  if (!result.success) {
    throw new LayoutDecodeError(
      result.error.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message })),
    );
  }
  return { attributes: doc.attributes, root: result.data };
}

// --- encoding ---

const float = (value: number): RonValue => ({ kind: 'number', value, float: true });
const int = (value: number): RonValue => ({ kind: 'number', value, float: false });
const str = (value: string): RonValue => ({ kind: 'string', value });
const bool = (value: boolean): RonValue => ({ kind: 'bool', value });
const ident = (name: string): RonValue => ({ kind: 'ident', name });
const field = (name: string, value: RonValue): RonField => ({ name, value });

function encodeColor(c: Color): RonValue {
  return { kind: 'tuple', items: c.map(float) };
}

function encodeAsset(a: AssetRef): RonValue {
  return {
    kind: 'tuple',
    name: 'File',
    items: [str(a.path), { kind: 'tuple', items: [str(a.kind), { kind: 'unit' }] }],
  };
}

function encodeStretch(s: Stretch): RonValue {
  switch (s.kind) {
    case 'NoStretch':
      return ident('NoStretch');
    case 'X':
      return { kind: 'struct', name: 'X', fields: [field('x_margin', float(s.xMargin))] };
    case 'Y':
      return { kind: 'struct', name: 'Y', fields: [field('y_margin', float(s.yMargin))] };
    case 'XY':
      return {
        kind: 'struct',
        name: 'XY',
        fields: [
          field('x_margin', float(s.xMargin)),
          field('y_margin', float(s.yMargin)),
          field('keep_aspect_ratio', bool(s.keepAspectRatio)),
        ],
      };
  }
}

function encodeTransform(t: Transform): RonValue {
  const fields: RonField[] = [field('id', str(t.id))];
  if (t.anchor !== 'Middle') fields.push(field('anchor', ident(t.anchor)));
  if (t.pivot !== 'Middle') fields.push(field('pivot', ident(t.pivot)));
  if (!Object.is(t.x, 0)) fields.push(field('x', float(t.x)));
  if (!Object.is(t.y, 0)) fields.push(field('y', float(t.y)));
  if (!Object.is(t.z, 0)) fields.push(field('z', float(t.z)));
  fields.push(field('width', float(t.width)), field('height', float(t.height)));
  if (t.stretch) fields.push(field('stretch', encodeStretch(t.stretch)));
  if (t.tabOrder !== 0) fields.push(field('tab_order', int(t.tabOrder)));
  if (t.mouseReactive) fields.push(field('mouse_reactive', bool(true)));
  if (!t.opaque) fields.push(field('opaque', bool(false)));
  if (t.percent) fields.push(field('percent', bool(true)));
  return { kind: 'struct', fields };
}

export function encodeImage(img: UiImage): RonValue {
  switch (img.kind) {
    case 'SolidColor':
      return { kind: 'tuple', name: 'SolidColor', items: img.color.map(float) };
    case 'Texture':
      return { kind: 'tuple', name: 'Texture', items: [encodeAsset(img.tex)] };
    case 'NineSlice':
      return {
        kind: 'struct',
        name: 'NineSlice',
        fields: [
          field('x_start', int(img.xStart)),
          field('y_start', int(img.yStart)),
          field('width', int(img.width)),
          field('height', int(img.height)),
          field('left_dist', int(img.leftDist)),
          field('right_dist', int(img.rightDist)),
          field('top_dist', int(img.topDist)),
          field('bottom_dist', int(img.bottomDist)),
          field('tex', encodeAsset(img.tex)),
          field('texture_dimensions', { kind: 'tuple', items: img.textureDimensions.map(int) }),
        ],
      };
  }
}

function encodeText(t: TextSpec): RonValue {
  const fields: RonField[] = [
    field('text', str(t.text)),
    field('font', encodeAsset(t.font)),
    field('font_size', float(t.fontSize)),
    field('color', encodeColor(t.color)),
  ];
  if (t.lineMode !== 'Single') fields.push(field('line_mode', ident(t.lineMode)));
  if (t.align !== 'Middle') fields.push(field('align', ident(t.align)));
  if (t.password) fields.push(field('password', bool(true)));
  if (t.editable) {
    fields.push(
      field('editable', {
        kind: 'struct',
        fields: [
          field('max_length', int(t.editable.maxLength)),
          field('selected_text_color', encodeColor(t.editable.selectedTextColor)),
          field('selected_background_color', encodeColor(t.editable.selectedBackgroundColor)),
        ],
      }),
    );
  }
  return { kind: 'struct', fields };
}

function encodeButton(b: ButtonSpec): RonValue {
  const fields: RonField[] = [
    field('text', str(b.text)),
    field('font', encodeAsset(b.font)),
    field('font_size', float(b.fontSize)),
    field('normal_text_color', encodeColor(b.normalTextColor)),
  ];
  if (b.normalImage) fields.push(field('normal_image', encodeImage(b.normalImage)));
  if (b.hoverImage) fields.push(field('hover_image', encodeImage(b.hoverImage)));
  if (b.hoverTextColor) fields.push(field('hover_text_color', encodeColor(b.hoverTextColor)));
  if (b.pressImage) fields.push(field('press_image', encodeImage(b.pressImage)));
  if (b.pressTextColor) fields.push(field('press_text_color', encodeColor(b.pressTextColor)));
  return { kind: 'struct', fields };
}

export function encodeNode(node: LayoutNode): RonValue {
  const fields: RonField[] = [field('transform', encodeTransform(node.transform))];
  switch (node.type) {
    case 'Container':
      if (node.background) fields.push(field('background', encodeImage(node.background)));
      if (node.children) {
        fields.push(field('children', { kind: 'list', items: node.children.map(encodeNode) }));
      }
      break;
    case 'Label':
      fields.push(field('text', encodeText(node.text)));
      break;
    case 'Image':
      fields.push(field('image', encodeImage(node.image)));
      break;
    case 'Button':
      fields.push(field('button', encodeButton(node.button)));
      break;
  }
  return { kind: 'struct', name: node.type, fields };
}

export function encodeLayout(layout: LayoutDocument): RonDocument {
  return { attributes: layout.attributes, value: encodeNode(layout.root) };
}

/** Parse RON layout text into the typed model. */
export function parseLayout(source: string): LayoutDocument {
  return decodeLayout(parseRon(source));
}

export function serializeLayout(layout: LayoutDocument, options?: RonWriterOptions): string {
  return stringifyRonDocument(encodeLayout(layout), options);
}
