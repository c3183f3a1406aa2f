// Zod schemas from the plain form of a RON layout to the typed model.
// Plain form: named structs become `{ $tag, ...fields }`, named tuples
// `{ $tag, $items }`, anonymous tuples arrays, bare identifiers strings.

import { z } from 'zod';
import {
  ANCHORS,
  type ButtonSpec,
  type LayoutNode,
  type Stretch,
  type TextSpec,
  type Transform,
  type UiImage,
} from '../types';

const u32 = z.number().int().nonnegative();
const real = z.number().finite();

export const anchorSchema = z.enum(ANCHORS);

export const colorSchema = z.tuple([real, real, real, real]);

export const assetRefSchema = z
  .object({
    $tag: z.literal('File'),
    $items: z.tuple([z.string().min(1), z.tuple([z.enum(['IMAGE', 'TTF']), z.null()])]),
  })
  .strict()
  .transform(({ $items: [path, [kind]] }) => ({ path, kind }));

export const stretchSchema = z.union([
  z.literal('NoStretch').transform((): Stretch => ({ kind: 'NoStretch' })),
  z
    .object({ $tag: z.literal('X'), x_margin: real })
    .strict()
    .transform((s): Stretch => ({ kind: 'X', xMargin: s.x_margin })),
  z
    .object({ $tag: z.literal('Y'), y_margin: real })
    .strict()
    .transform((s): Stretch => ({ kind: 'Y', yMargin: s.y_margin })),
  z
    .object({
      $tag: z.literal('XY'),
      x_margin: real,
      y_margin: real,
      keep_aspect_ratio: z.boolean().default(false),
    })
    .strict()
    .transform(
      (s): Stretch => ({
        kind: 'XY',
        xMargin: s.x_margin,
        yMargin: s.y_margin,
        keepAspectRatio: s.keep_aspect_ratio,
      }),
    ),
]);

export const transformSchema = z
  .object({
    id: z.string().default(''),
    anchor: anchorSchema.default('Middle'),
    pivot: anchorSchema.default('Middle'),
    x: real.default(0),
    y: real.default(0),
    z: real.default(0),
    width: real.default(0),
    height: real.default(0),
    stretch: stretchSchema.optional(),
    tab_order: z.number().int().default(0),
    mouse_reactive: z.boolean().default(false),
    opaque: z.boolean().default(true),
    percent: z.boolean().default(false),
  })
  .strict()
  .transform(
    (t): Transform => ({
      id: t.id,
      anchor: t.anchor,
      pivot: t.pivot,
      x: t.x,
      y: t.y,
      z: t.z,
      width: t.width,
      height: t.height,
      ...(t.stretch ? { stretch: t.stretch } : {}),
      tabOrder: t.tab_order,
      mouseReactive: t.mouse_reactive,
      opaque: t.opaque,
      percent: t.percent,
    }),
  );

export const uiImageSchema = z
  .discriminatedUnion('$tag', [
    z.object({ $tag: z.literal('SolidColor'), $items: colorSchema }).strict(),
    z.object({ $tag: z.literal('Texture'), $items: z.tuple([assetRefSchema]) }).strict(),
    z
      .object({
        $tag: z.literal('NineSlice'),
        x_start: u32,
        y_start: u32,
        width: u32,
        height: u32,
        left_dist: u32,
        right_dist: u32,
        top_dist: u32,
        bottom_dist: u32,
        tex: assetRefSchema,
        texture_dimensions: z.tuple([u32, u32]),
      })
      .strict(),
  ])
  .transform((img): UiImage => {
    switch (img.$tag) {
      case 'SolidColor':
        return { kind: 'SolidColor', color: img.$items };
      case 'Texture':
        return { kind: 'Texture', tex: img.$items[0] };
      case 'NineSlice':
        return {
          kind: 'NineSlice',
          xStart: img.x_start,
          yStart: img.y_start,
          width: img.width,
          height: img.height,
          leftDist: img.left_dist,
          rightDist: img.right_dist,
          topDist: img.top_dist,
          bottomDist: img.bottom_dist,
          tex: img.tex,
          textureDimensions: img.texture_dimensions,
        };
    }
  });

const editableSchema = z
  .object({
    max_length: u32.default(1000),
    selected_text_color: colorSchema,
    selected_background_color: colorSchema,
  })
  .strict();

export const textSchema = z
  .object({
    text: z.string(),
    font: assetRefSchema,
    font_size: real,
    color: colorSchema,
    line_mode: z.enum(['Single', 'Wrap']).default('Single'),
    align: anchorSchema.default('Middle'),
    password: z.boolean().default(false),
    editable: editableSchema.optional(),
  })
  .strict()
  .transform(
    (t): TextSpec => ({
      text: t.text,
      font: t.font,
      fontSize: t.font_size,
      color: t.color,
      lineMode: t.line_mode,
      align: t.align,
      password: t.password,
      ...(t.editable
        ? {
            editable: {
              maxLength: t.editable.max_length,
              selectedTextColor: t.editable.selected_text_color,
              selectedBackgroundColor: t.editable.selected_background_color,
            },
          }
        : {}),
    }),
  );

export const buttonSchema = z
  .object({
    text: z.string(),
    font: assetRefSchema,
    font_size: real,
    normal_text_color: colorSchema,
    normal_image: uiImageSchema.optional(),
    hover_image: uiImageSchema.optional(),
    hover_text_color: colorSchema.optional(),
    press_image: uiImageSchema.optional(),
    press_text_color: colorSchema.optional(),
  })
  .strict()
  .transform((b): ButtonSpec => {
    const spec: ButtonSpec = {
      text: b.text,
      font: b.font,
      fontSize: b.font_size,
      normalTextColor: b.normal_text_color,
    };
    if (b.normal_image) spec.normalImage = b.normal_image;
    if (b.hover_image) spec.hoverImage = b.hover_image;
    if (b.hover_text_color) spec.hoverTextColor = b.hover_text_color;
    if (b.press_image) spec.pressImage = b.press_image;
    if (b.press_text_color) spec.pressTextColor = b.press_text_color;
    return spec;
  });

export const layoutNodeSchema: z.ZodType<LayoutNode, z.ZodTypeDef, unknown> = z.lazy(() =>
  z
    .discriminatedUnion('$tag', [
      z
        .object({
          $tag: z.literal('Container'),
          transform: transformSchema,
          background: uiImageSchema.optional(),
          children: z.array(layoutNodeSchema).optional(),
        })
        .strict(),
      z.object({ $tag: z.literal('Label'), transform: transformSchema, text: textSchema }).strict(),
      z.object({ $tag: z.literal('Image'), transform: transformSchema, image: uiImageSchema }).strict(),
      z.object({ $tag: z.literal('Button'), transform: transformSchema, button: buttonSchema }).strict(),
    ])
    .transform((n): LayoutNode => {
      switch (n.$tag) {
        case 'Container':
          return {
            type: 'Container',
            transform: n.transform,
            ...(n.background ? { background: n.background } : {}),
            ...(n.children ? { children: n.children } : {}),
          };
        case 'Label':
          return { type: 'Label', transform: n.transform, text: n.text };
        case 'Image':
          return { type: 'Image', transform: n.transform, image: n.image };
        case 'Button':
          return { type: 'Button', transform: n.transform, button: n.button };
      }
    }),
);
