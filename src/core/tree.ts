import type { AssetRef, LayoutNode, NodeId, UiImage } from '../types';

export type WalkContext = {
  /** e.g. `children[2].children[0]`; empty for the root. */
  path: string;
  depth: number;
  parent: LayoutNode | null;
  /** Position within the parent's children. */
  index: number;
};

/**
 * Pre-order walk in declaration order. Return `false` from `visit` to skip
 * the node's children.
 */
export function walkLayout(
  root: LayoutNode,
  visit: (node: LayoutNode, ctx: WalkContext) => boolean | void,
): void {
  const step = (node: LayoutNode, ctx: WalkContext) => {
    if (visit(node, ctx) === false) return;
    if (node.type !== 'Container' || !node.children) return;
    node.children.forEach((child, index) => {
      step(child, {
        path: `${ctx.path ? `${ctx.path}.` : ''}children[${index}]`,
        depth: ctx.depth + 1,
        parent: node,
        index,
      });
    });
  };
  step(root, { path: '', depth: 0, parent: null, index: 0 });
}

export function countNodes(root: LayoutNode): number {
  let n = 0;
  walkLayout(root, () => {
    n++;
  });
  return n;
}

/** Non-empty ids in declaration order, duplicates included. */
export function collectIds(root: LayoutNode): NodeId[] {
  const ids: NodeId[] = [];
  walkLayout(root, (node) => {
    if (node.transform.id) ids.push(node.transform.id);
  });
  return ids;
}

export function findNode(root: LayoutNode, id: NodeId): LayoutNode | undefined {
  return findNodeWithPath(root, id)?.node;
}

export function findNodePath(root: LayoutNode, id: NodeId): string | undefined {
  return findNodeWithPath(root, id)?.path;
}

function findNodeWithPath(
  root: LayoutNode,
  id: NodeId,
): { node: LayoutNode; path: string } | undefined {
  let found: { node: LayoutNode; path: string } | undefined;
  walkLayout(root, (node, ctx) => {
    if (found) return false;
    if (node.transform.id === id) {
      found = { node, path: ctx.path };
      return false;
    }
    return true;
  });
  return found;
}

/** All nodes whose id starts with `prefix`, in declaration order. */
export function findNodesByPrefix(root: LayoutNode, prefix: string): LayoutNode[] {
  const out: LayoutNode[] = [];
  walkLayout(root, (node) => {
    if (node.transform.id.startsWith(prefix)) out.push(node);
  });
  return out;
}

export type AssetUsage = 'font' | 'image';

export type AssetReference = {
  asset: AssetRef;
  usage: AssetUsage;
  nodeId: NodeId;
  nodePath: string;
  /** Field holding the reference, e.g. `button.normal_image`. */
  field: string;
};

function imageAssets(img: UiImage | undefined): AssetRef[] {
  if (!img || img.kind === 'SolidColor') return [];
  return [img.tex];
}

export function collectAssetRefs(root: LayoutNode): AssetReference[] {
  const out: AssetReference[] = [];
  walkLayout(root, (node, ctx) => {
    const push = (asset: AssetRef, usage: AssetUsage, field: string) =>
      out.push({ asset, usage, nodeId: node.transform.id, nodePath: ctx.path, field });

    switch (node.type) {
      case 'Container':
        imageAssets(node.background).forEach((a) => push(a, 'image', 'background'));
        break;
      case 'Label':
        push(node.text.font, 'font', 'text.font');
        break;
      case 'Image':
        imageAssets(node.image).forEach((a) => push(a, 'image', 'image'));
        break;
      case 'Button': {
        const b = node.button;
        push(b.font, 'font', 'button.font');
        imageAssets(b.normalImage).forEach((a) => push(a, 'image', 'button.normal_image'));
        imageAssets(b.hoverImage).forEach((a) => push(a, 'image', 'button.hover_image'));
        imageAssets(b.pressImage).forEach((a) => push(a, 'image', 'button.press_image'));
        break;
      }
    }
  });
  return out;
}

/** Ids of mouse-reactive nodes by ascending tab order; ties keep declaration order. */
export function focusOrder(root: LayoutNode): NodeId[] {
  const reactive: { id: NodeId; tabOrder: number; seq: number }[] = [];
  walkLayout(root, (node) => {
    if (node.transform.mouseReactive) {
      reactive.push({ id: node.transform.id, tabOrder: node.transform.tabOrder, seq: reactive.length });
    }
  });
  return reactive
    .sort((a, b) => a.tabOrder - b.tabOrder || a.seq - b.seq)
    .map((r) => r.id);
}

// --- immutable edits ---

/**
 * Replace the node with `id` by `fn(node)`. Returns the same root when the id
 * is not found or `fn` returns the node unchanged.
 */
export function mapNode(
  root: LayoutNode,
  id: NodeId,
  fn: (node: LayoutNode) => LayoutNode,
): LayoutNode {
  if (root.transform.id === id) return fn(root);
  if (root.type !== 'Container' || !root.children) return root;
  let changed = false;
  const children = root.children.map((child) => {
    const next = mapNode(child, id, fn);
    if (next !== child) changed = true;
    return next;
  });
  return changed ? { ...root, children } : root;
}

export function insertChild(
  root: LayoutNode,
  parentId: NodeId,
  node: LayoutNode,
  index?: number,
): LayoutNode {
  return mapNode(root, parentId, (parent) => {
    if (parent.type !== 'Container') return parent;
    const children = parent.children ? parent.children.slice() : [];
    const at = index === undefined ? children.length : Math.max(0, Math.min(index, children.length));
    children.splice(at, 0, node);
    return { ...parent, children };
  });
}

/** Remove the node with `id` and its whole subtree. The root itself is never removed. */
export function removeNode(root: LayoutNode, id: NodeId): LayoutNode {
  if (root.type !== 'Container' || !root.children) return root;
  let changed = false;
  const children: LayoutNode[] = [];
  for (const child of root.children) {
    if (!changed && child.transform.id === id) {
      changed = true;
      continue;
    }
    const next = changed ? child : removeNode(child, id);
    if (next !== child) changed = true;
    children.push(next);
  }
  return changed ? { ...root, children } : root;
}

/** Move the node with `id` to `toIndex` among its siblings. */
export function moveChild(root: LayoutNode, id: NodeId, toIndex: number): LayoutNode {
  if (root.type !== 'Container' || !root.children) return root;
  const from = root.children.findIndex((c) => c.transform.id === id);
  if (from >= 0) {
    const children = root.children.slice();
    const [moved] = children.splice(from, 1);
    if (!moved) return root;
    const at = Math.max(0, Math.min(toIndex, children.length));
    if (at === from) return root;
    children.splice(at, 0, moved);
    return { ...root, children };
  }
  let changed = false;
  const children = root.children.map((child) => {
    if (changed) return child;
    const next = moveChild(child, id, toIndex);
    if (next !== child) changed = true;
    return next;
  });
  return changed ? { ...root, children } : root;
}
