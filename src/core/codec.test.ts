import { describe, expect, it } from 'vitest';
import { decodeLayout, parseLayout, serializeLayout, toPlain } from './codec';
import { LayoutDecodeError } from './errors';
import { parseRon } from './ron';

const LABEL_SOURCE = `Label(
  transform: (id: "title", width: 100., height: 20.),
  text: (text: "Hi", font: File("font/a.ttf", ("TTF", ())), font_size: 12., color: (1., 1., 1., 1.)),
)`;

function decodeError(source: string): LayoutDecodeError {
  try {
    parseLayout(source);
  } catch (e) {
    if (e instanceof LayoutDecodeError) return e;
    throw e;
  }
  throw new Error('expected a decode error');
}

describe('toPlain', () => {
  it('tags named values and unwraps Some', () => {
    const plain = toPlain(parseRon('Foo(a: Some(Bar(1, 2)), b: None, c: Baz)').value);
    expect(plain).toEqual({ $tag: 'Foo', a: { $tag: 'Bar', $items: [1, 2] }, c: 'Baz' });
  });
});

describe('parseLayout', () => {
  it('decodes a label and fills transform and text defaults', () => {
    const layout = parseLayout(LABEL_SOURCE);
    expect(layout).toEqual({
      attributes: [],
      root: {
        type: 'Label',
        transform: {
          id: 'title',
          anchor: 'Middle',
          pivot: 'Middle',
          x: 0,
          y: 0,
          z: 0,
          width: 100,
          height: 20,
          tabOrder: 0,
          mouseReactive: false,
          opaque: true,
          percent: false,
        },
        text: {
          text: 'Hi',
          font: { path: 'font/a.ttf', kind: 'TTF' },
          fontSize: 12,
          color: [1, 1, 1, 1],
          lineMode: 'Single',
          align: 'Middle',
          password: false,
        },
      },
    });
  });

  it('decodes every stretch variant', () => {
    const stretchOf = (s: string) => {
      const { root } = parseLayout(`Container(transform: (id: "c", stretch: ${s}))`);
      return root.transform.stretch;
    };
    expect(stretchOf('NoStretch')).toEqual({ kind: 'NoStretch' });
    expect(stretchOf('X(x_margin: 5.)')).toEqual({ kind: 'X', xMargin: 5 });
    expect(stretchOf('Y(y_margin: 2.)')).toEqual({ kind: 'Y', yMargin: 2 });
    expect(stretchOf('XY(x_margin: 1., y_margin: 3., keep_aspect_ratio: true)')).toEqual({
      kind: 'XY',
      xMargin: 1,
      yMargin: 3,
      keepAspectRatio: true,
    });
  });

  it('drops None fields and unwraps Some values', () => {
    const { root } = parseLayout(
      'Image(transform: (id: "i", stretch: None), image: Some(SolidColor(0., 0., 0., 1.)))',
    );
    expect(root).toMatchObject({ type: 'Image', image: { kind: 'SolidColor', color: [0, 0, 0, 1] } });
    expect(root.transform.stretch).toBeUndefined();
  });

  it('keeps an empty children list distinct from an absent one', () => {
    expect(parseLayout('Container(transform: (id: "a"), children: [])').root).toMatchObject({
      children: [],
    });
    expect(parseLayout('Container(transform: (id: "a"))').root).not.toHaveProperty('children');
  });

  it('rejects unknown node tags', () => {
    const err = decodeError('Slider(transform: (id: "s"))');
    expect(err.code).toBe('LAYOUT_DECODE');
    expect(err.issues[0]?.path).toBe('$tag');
  });

  it('rejects unknown anchors with the field path', () => {
    const err = decodeError('Container(transform: (id: "c", anchor: Centre))');
    expect(err.issues.map((i) => i.path)).toEqual(['transform.anchor']);
  });

  it('rejects unknown fields', () => {
    const err = decodeError('Container(transform: (id: "c", colour: 1))');
    expect(err.issues).toHaveLength(1);
    expect(err.issues[0]?.path).toBe('transform');
    expect(err.issues[0]?.message).toContain('colour');
  });

  it('reports missing fields inside nested children', () => {
    const err = decodeError(`Container(
      transform: (id: "root"),
      children: [
        Label(
          transform: (id: "a"),
          text: (text: "", font: File("f.ttf", ("TTF", ())), color: (1., 1., 1., 1.)),
        ),
      ],
    )`);
    expect(err.issues).toEqual([{ path: 'children.0.text.font_size', message: 'Required' }]);
  });

  it('rejects infinite numbers decoded from a value tree', () => {
    const err = (() => {
      try {
        decodeLayout({
          attributes: [],
          value: {
            kind: 'struct',
            name: 'Container',
            fields: [
              {
                name: 'transform',
                value: {
                  kind: 'struct',
                  fields: [{ name: 'width', value: { kind: 'number', value: Infinity, float: true } }],
                },
              },
            ],
          },
        });
      } catch (e) {
        return e;
      }
      return undefined;
    })();
    expect(err).toBeInstanceOf(LayoutDecodeError);
    expect(err).toMatchObject({ issues: [{ path: 'transform.width' }] });
  });

  it('rejects fractional nine-slice coordinates', () => {
    const err = decodeError(`Container(
      transform: (id: "p"),
      background: NineSlice(
        x_start: 4.5, y_start: 4, width: 56, height: 56,
        left_dist: 4, right_dist: 4, top_dist: 4, bottom_dist: 4,
        tex: File("texture/panel.png", ("IMAGE", ())),
        texture_dimensions: (64, 64),
      ),
    )`);
    expect(err.issues.map((i) => i.path)).toEqual(['background.x_start']);
  });
});

describe('serializeLayout', () => {
  it('writes only non-default fields, always keeping id and size', () => {
    expect(serializeLayout(parseLayout(LABEL_SOURCE))).toBe(
      [
        'Label(',
        '    transform: (',
        '        id: "title",',
        '        width: 100.,',
        '        height: 20.,',
        '    ),',
        '    text: (',
        '        text: "Hi",',
        '        font: File("font/a.ttf", ("TTF", ())),',
        '        font_size: 12.,',
        '        color: (1., 1., 1., 1.),',
        '    ),',
        ')',
        '',
      ].join('\n'),
    );
  });

  it('round-trips exponent-sized and negative-zero coordinates', () => {
    const layout = parseLayout('Container(transform: (id: "c", x: -0., width: 1e21, height: 2.5e-7))');
    const text = serializeLayout(layout);
    expect(text).toContain('\n        x: -0.,\n');
    expect(text).toContain('\n        width: 1e+21,\n');
    const again = parseLayout(text);
    expect(again).toEqual(layout);
    expect(Object.is(again.root.transform.x, -0)).toBe(true);
  });

  it('round-trips every node and image variant', () => {
    const source = `#![enable(implicit_some)]
Container(
  transform: (
    id: "root",
    anchor: TopLeft,
    pivot: BottomRight,
    x: -3.5, y: 2., z: 4.,
    width: 10., height: 20.,
    stretch: XY(x_margin: 1., y_margin: 2., keep_aspect_ratio: true),
    tab_order: 7,
    mouse_reactive: true,
    opaque: false,
    percent: true,
  ),
  background: NineSlice(
    x_start: 4, y_start: 4, width: 56, height: 56,
    left_dist: 4, right_dist: 4, top_dist: 4, bottom_dist: 4,
    tex: File("texture/panel.png", ("IMAGE", ())),
    texture_dimensions: (64, 64),
  ),
  children: [
    Label(
      transform: (id: "name", width: 1., height: 1.),
      text: (
        text: "Port \\"Royal\\"",
        font: File("font/square.ttf", ("TTF", ())),
        font_size: 20.,
        color: (1., 0.5, 0.25, 1.),
        line_mode: Wrap,
        align: TopLeft,
        password: true,
        editable: (
          max_length: 40,
          selected_text_color: (0., 0., 0., 1.),
          selected_background_color: (1., 1., 1., 0.5),
        ),
      ),
    ),
    Image(transform: (id: "icon"), image: Texture(File("texture/icon.png", ("IMAGE", ())))),
    Button(
      transform: (id: "go", tab_order: 1, mouse_reactive: true),
      button: (
        text: "Go",
        font: File("font/square.ttf", ("TTF", ())),
        font_size: 15.,
        normal_text_color: (1., 1., 1., 1.),
        normal_image: SolidColor(0.1, 0.1, 0.1, 1.),
        hover_image: Texture(File("texture/hover.png", ("IMAGE", ()))),
        hover_text_color: (1., 1., 0., 1.),
        press_image: SolidColor(0., 0., 0., 1.),
        press_text_color: (0.5, 0.5, 0.5, 1.),
      ),
    ),
    Container(transform: (id: "empty"), children: []),
  ],
)`;
    const layout = parseLayout(source);
    const again = parseLayout(serializeLayout(layout));
    expect(again).toEqual(layout);
    expect(again.attributes).toEqual([{ name: 'enable', args: ['implicit_some'] }]);
  });
});
