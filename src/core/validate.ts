import type { AssetKind, Color, LayoutDocument, LayoutNode, Transform, UiImage } from '../types';
import { LayoutValidationError, type ValidationIssue } from './errors';
import { collectAssetRefs, walkLayout } from './tree';

export interface ValidationResult {
  valid: boolean;
  issues: ValidationIssue[];
}

const EXTENSION_KINDS: Record<string, AssetKind> = {
  ttf: 'TTF',
  otf: 'TTF',
  png: 'IMAGE',
  jpg: 'IMAGE',
  jpeg: 'IMAGE',
  bmp: 'IMAGE',
  tga: 'IMAGE',
};

/** Asset kind implied by a path's extension, or undefined when unknown. */
export function kindForPath(path: string): AssetKind | undefined {
  const dot = path.lastIndexOf('.');
  if (dot < 0 || dot < path.lastIndexOf('/')) return undefined;
  return EXTENSION_KINDS[path.slice(dot + 1).toLowerCase()];
}

function checkColor(color: Color, where: string): string | null {
  const bad = color.findIndex((c) => !(c >= 0 && c <= 1));
  if (bad < 0) return null;
  return `${where} component ${bad} is ${color[bad]}, expected a value in [0, 1]`;
}

function imageColors(img: UiImage | undefined, where: string): [Color, string][] {
  return img && img.kind === 'SolidColor' ? [[img.color, where]] : [];
}

function nodeColors(node: LayoutNode): [Color, string][] {
  switch (node.type) {
    case 'Container':
      return imageColors(node.background, 'background');
    case 'Image':
      return imageColors(node.image, 'image');
    case 'Label': {
      const out: [Color, string][] = [[node.text.color, 'text.color']];
      if (node.text.editable) {
        out.push(
          [node.text.editable.selectedTextColor, 'text.editable.selected_text_color'],
          [node.text.editable.selectedBackgroundColor, 'text.editable.selected_background_color'],
        );
      }
      return out;
    }
    case 'Button': {
      const b = node.button;
      const out: [Color, string][] = [[b.normalTextColor, 'button.normal_text_color']];
      if (b.hoverTextColor) out.push([b.hoverTextColor, 'button.hover_text_color']);
      if (b.pressTextColor) out.push([b.pressTextColor, 'button.press_text_color']);
      return [
        ...out,
        ...imageColors(b.normalImage, 'button.normal_image'),
        ...imageColors(b.hoverImage, 'button.hover_image'),
        ...imageColors(b.pressImage, 'button.press_image'),
      ];
    }
  }
}

function nodeImages(node: LayoutNode): [UiImage, string][] {
  const out: [UiImage, string][] = [];
  const add = (img: UiImage | undefined, where: string) => {
    if (img) out.push([img, where]);
  };
  if (node.type === 'Container') add(node.background, 'background');
  if (node.type === 'Image') add(node.image, 'image');
  if (node.type === 'Button') {
    add(node.button.normalImage, 'button.normal_image');
    add(node.button.hoverImage, 'button.hover_image');
    add(node.button.pressImage, 'button.press_image');
  }
  return out;
}

function nineSliceProblem(img: UiImage): string | null {
  if (img.kind !== 'NineSlice') return null;
  const [texW, texH] = img.textureDimensions;
  if (img.xStart + img.width > texW || img.yStart + img.height > texH) {
    return `source rect (${img.xStart}, ${img.yStart}, ${img.width}x${img.height}) exceeds texture ${texW}x${texH}`;
  }
  if (img.leftDist + img.rightDist > img.width) {
    return `left_dist + right_dist (${img.leftDist + img.rightDist}) exceeds slice width ${img.width}`;
  }
  if (img.topDist + img.bottomDist > img.height) {
    return `top_dist + bottom_dist (${img.topDist + img.bottomDist}) exceeds slice height ${img.height}`;
  }
  return null;
}

function sizeProblems(t: Transform): string[] {
  const out: string[] = [];
  if (t.width < 0) out.push(`width is ${t.width}`);
  if (t.height < 0) out.push(`height is ${t.height}`);
  const s = t.stretch;
  if (s && (s.kind === 'X' || s.kind === 'XY') && s.xMargin < 0) out.push(`x_margin is ${s.xMargin}`);
  if (s && (s.kind === 'Y' || s.kind === 'XY') && s.yMargin < 0) out.push(`y_margin is ${s.yMargin}`);
  return out;
}

export function validateNode(root: LayoutNode): ValidationResult {
  const issues: ValidationIssue[] = [];
  const firstSeen = new Map<string, string>();

  walkLayout(root, (node, ctx) => {
    const nodeId = node.transform.id;
    const issue = (code: ValidationIssue['code'], message: string) =>
      issues.push({ code, path: ctx.path, nodeId, message });

    if (nodeId) {
      const prior = firstSeen.get(nodeId);
      if (prior !== undefined) {
        issue('DUPLICATE_ID', `id "${nodeId}" already used at ${prior || '<root>'}`);
      } else {
        firstSeen.set(nodeId, ctx.path);
      }
    }

    for (const problem of sizeProblems(node.transform)) {
      issue('NEGATIVE_SIZE', `${problem}, expected >= 0`);
    }

    for (const [color, where] of nodeColors(node)) {
      const problem = checkColor(color, where);
      if (problem) issue('COLOR_OUT_OF_RANGE', problem);
    }

    const fontSize =
      node.type === 'Label' ? node.text.fontSize : node.type === 'Button' ? node.button.fontSize : undefined;
    if (fontSize !== undefined && !(fontSize > 0)) {
      issue('INVALID_FONT_SIZE', `font_size is ${fontSize}, expected > 0`);
    }

    for (const [img, where] of nodeImages(node)) {
      const problem = nineSliceProblem(img);
      if (problem) issue('NINE_SLICE_BOUNDS', `${where}: ${problem}`);
    }
    return true;
  });

  for (const ref of collectAssetRefs(root)) {
    const { asset, usage, nodeId, nodePath: path } = ref;
    const implied = kindForPath(asset.path);
    if (implied === undefined) {
      issues.push({
        code: 'UNKNOWN_ASSET_EXTENSION',
        path,
        nodeId,
        message: `${ref.field}: cannot infer asset kind of "${asset.path}"`,
      });
    } else if (implied !== asset.kind) {
      issues.push({
        code: 'ASSET_KIND_MISMATCH',
        path,
        nodeId,
        message: `${ref.field}: "${asset.path}" is declared ${asset.kind} but its extension implies ${implied}`,
      });
    }
    const expected: AssetKind = usage === 'font' ? 'TTF' : 'IMAGE';
    if (asset.kind !== expected) {
      issues.push({
        code: 'ASSET_USAGE_MISMATCH',
        path,
        nodeId,
        message: `${ref.field}: ${usage} slot references a ${asset.kind} asset`,
      });
    }
  }

  return { valid: issues.length === 0, issues };
}

export function validateLayout(layout: LayoutDocument): ValidationResult {
  return validateNode(layout.root);
}

export function assertValidLayout(layout: LayoutDocument, source?: string): void {
  const { valid, issues } = validateLayout(layout);
  if (!valid) throw new LayoutValidationError(issues, source);
}
