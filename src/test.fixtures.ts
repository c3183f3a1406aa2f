// Node builders shared by the unit tests
import type {
  AssetRef,
  ButtonNode,
  ContainerNode,
  ImageNode,
  LabelNode,
  LayoutDocument,
  LayoutNode,
  Transform,
} from './types';

export const FONT: AssetRef = { path: 'font/square.ttf', kind: 'TTF' };
export const PANEL: AssetRef = { path: 'texture/panel.png', kind: 'IMAGE' };

export function transform(id: string, patch: Partial<Transform> = {}): Transform {
  return {
    id,
    anchor: 'Middle',
    pivot: 'Middle',
    x: 0,
    y: 0,
    z: 0,
    width: 10,
    height: 10,
    tabOrder: 0,
    mouseReactive: false,
    opaque: true,
    percent: false,
    ...patch,
  };
}

export function label(id: string, text = '', patch: Partial<Transform> = {}): LabelNode {
  return {
    type: 'Label',
    transform: transform(id, patch),
    text: {
      text,
      font: FONT,
      fontSize: 20,
      color: [1, 1, 1, 1],
      lineMode: 'Single',
      align: 'Middle',
      password: false,
    },
  };
}

export function container(id: string, children?: LayoutNode[], patch: Partial<Transform> = {}): ContainerNode {
  const node: ContainerNode = { type: 'Container', transform: transform(id, patch) };
  if (children) node.children = children;
  return node;
}

export function image(id: string, tex: AssetRef = PANEL): ImageNode {
  return { type: 'Image', transform: transform(id), image: { kind: 'Texture', tex } };
}

export function button(id: string, patch: Partial<Transform> = {}): ButtonNode {
  return {
    type: 'Button',
    transform: transform(id, { mouseReactive: true, ...patch }),
    button: {
      text: '',
      font: FONT,
      fontSize: 20,
      normalTextColor: [1, 1, 1, 1],
      normalImage: { kind: 'Texture', tex: { path: `texture/${id}.png`, kind: 'IMAGE' } },
    },
  };
}

export function doc(root: LayoutNode): LayoutDocument {
  return { attributes: [], root };
}
