export type NodeId = string;

export const ANCHORS = [
  'TopLeft',
  'TopMiddle',
  'TopRight',
  'MiddleLeft',
  'Middle',
  'MiddleRight',
  'BottomLeft',
  'BottomMiddle',
  'BottomRight',
] as const;

/** Reference point on a rectangle; used both as parent anchor and child pivot. */
export type Anchor = (typeof ANCHORS)[number];

export type Color = readonly [r: number, g: number, b: number, a: number];

export type Stretch =
  | { kind: 'NoStretch' }
  | { kind: 'X'; xMargin: number }
  | { kind: 'Y'; yMargin: number }
  | { kind: 'XY'; xMargin: number; yMargin: number; keepAspectRatio: boolean };

export type Transform = {
  /** Lookup key for runtime code. Empty for anonymous nodes. */
  id: NodeId;
  anchor: Anchor;
  pivot: Anchor;
  x: number;
  y: number;
  /** Draw order; higher values are drawn on top. */
  z: number;
  width: number;
  height: number;
  stretch?: Stretch;
  tabOrder: number;
  mouseReactive: boolean;
  opaque: boolean;
  /** When true, offsets and size are fractions of the parent. */
  percent: boolean;
};

export type AssetKind = 'IMAGE' | 'TTF';

export type AssetRef = {
  path: string;
  kind: AssetKind;
};

export type NineSlice = {
  xStart: number;
  yStart: number;
  width: number;
  height: number;
  leftDist: number;
  rightDist: number;
  topDist: number;
  bottomDist: number;
  tex: AssetRef;
  textureDimensions: readonly [width: number, height: number];
};

export type UiImage =
  | { kind: 'SolidColor'; color: Color }
  | { kind: 'Texture'; tex: AssetRef }
  | ({ kind: 'NineSlice' } & NineSlice);

export type LineMode = 'Single' | 'Wrap';

export type Editable = {
  maxLength: number;
  selectedTextColor: Color;
  selectedBackgroundColor: Color;
};

export type TextSpec = {
  text: string;
  font: AssetRef;
  fontSize: number;
  color: Color;
  lineMode: LineMode;
  align: Anchor;
  password: boolean;
  editable?: Editable;
};

export type ButtonSpec = {
  text: string;
  font: AssetRef;
  fontSize: number;
  normalTextColor: Color;
  normalImage?: UiImage;
  hoverImage?: UiImage;
  hoverTextColor?: Color;
  pressImage?: UiImage;
  pressTextColor?: Color;
};

export type ContainerNode = {
  type: 'Container';
  transform: Transform;
  background?: UiImage;
  children?: LayoutNode[];
};

export type LabelNode = {
  type: 'Label';
  transform: Transform;
  text: TextSpec;
};

export type ImageNode = {
  type: 'Image';
  transform: Transform;
  image: UiImage;
};

export type ButtonNode = {
  type: 'Button';
  transform: Transform;
  button: ButtonSpec;
};

export type LayoutNode = ContainerNode | LabelNode | ImageNode | ButtonNode;

export type NodeType = LayoutNode['type'];

/** Inner attribute such as `#![enable(implicit_some)]`. */
export type RonAttribute = {
  name: string;
  args: string[];
};

export type LayoutDocument = {
  attributes: RonAttribute[];
  root: LayoutNode;
};
