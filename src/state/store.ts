import { create } from 'zustand';
import { useShallow } from 'zustand/react/shallow';
import type { LayoutDocument, LayoutNode, NodeId, Transform, UiImage } from '../types';
import { serializeLayout } from '../core/codec';
import { logger } from '../core/logger';
import type { RonWriterOptions } from '../core/ronWriter';
import { collectIds, findNode, insertChild, mapNode, moveChild, removeNode } from '../core/tree';
import { validateLayout } from '../core/validate';

// Whole-root snapshots; trees are immutable so unchanged subtrees are shared.
type HistoryEntry = {
  label: string;
  before: LayoutNode;
  after: LayoutNode;
};

export const MAX_HISTORY = 100;

export type TransformPatch = Partial<Transform>;

export type HudLayoutState = {
  readonly document: LayoutDocument | null;
  readonly historyPast: HistoryEntry[];
  readonly historyFuture: HistoryEntry[];
  /** Reason the most recent edit was rejected; cleared by the next accepted edit. */
  readonly lastError: string | null;
};

export type HudLayoutActions = {
  /** Replace the document; refused when ids are not unique. */
  loadDocument: (document: LayoutDocument) => void;
  /** Replace the placeholder text of a Label or Button. */
  setText: (id: NodeId, text: string) => void;
  updateTransform: (id: NodeId, patch: TransformPatch) => void;
  /** Container background, Image image, or Button normal image. */
  setImage: (id: NodeId, image: UiImage) => void;
  insertNode: (parentId: NodeId, node: LayoutNode, index?: number) => void;
  /** Remove a node together with its subtree. */
  removeNode: (id: NodeId) => void;
  /** Reorder a node among its siblings. */
  moveNode: (id: NodeId, toIndex: number) => void;
  undo: () => void;
  redo: () => void;
  /** Serialize the current document, or null when none is loaded. */
  toRon: (options?: RonWriterOptions) => string | null;
};

export type HudLayoutStore = HudLayoutState & HudLayoutActions;

/** Result of an edit: the new root, or the reason it was rejected. */
type EditResult = LayoutNode | { rejected: string };

function rejected(reason: string): EditResult {
  return { rejected: reason };
}

function isRejection(r: EditResult): r is { rejected: string } {
  return 'rejected' in r;
}

const NUMERIC_TRANSFORM_FIELDS = ['x', 'y', 'z', 'width', 'height', 'tabOrder'] as const;

// Applies a patch, or names the field that would leave the transform unwritable.
function patchTransform(current: Transform, patch: TransformPatch): Transform | { rejected: string } {
  const cleared = Object.entries(patch).find(([key, value]) => key !== 'stretch' && value === undefined);
  if (cleared) return { rejected: `transform field "${cleared[0]}" cannot be cleared` };

  const { stretch, ...rest } = { ...current, ...patch };
  const next: Transform = stretch ? { ...rest, stretch } : rest;
  const bad = NUMERIC_TRANSFORM_FIELDS.find((key) => !Number.isFinite(next[key]));
  if (bad !== undefined) return { rejected: `transform field "${bad}" must be a finite number` };
  if (!Number.isInteger(next.tabOrder)) return { rejected: 'tab order must be an integer' };
  return next;
}

function requireNode(root: LayoutNode, id: NodeId): LayoutNode | { rejected: string } {
  if (!id) return { rejected: 'an id is required' };
  return findNode(root, id) ?? { rejected: `no node with id "${id}"` };
}

export const useHudLayoutStore = create<HudLayoutStore>()((set, get) => {
  const commit = (label: string, edit: (root: LayoutNode) => EditResult) =>
    set((s): Partial<HudLayoutStore> => {
      if (!s.document) {
        logger.warn('STORE', `${label} rejected: no document loaded`);
        return { lastError: 'no document loaded' };
      }
      const before = s.document.root;
      const result = edit(before);
      if (isRejection(result)) {
        logger.warn('STORE', `${label} rejected: ${result.rejected}`);
        return { lastError: result.rejected };
      }
      if (result === before) return { lastError: null };
      logger.debug('STORE', label);
      return {
        document: { ...s.document, root: result },
        historyPast: [...s.historyPast, { label, before, after: result }].slice(-MAX_HISTORY),
        historyFuture: [],
        lastError: null,
      };
    });

  return {
    document: null,
    historyPast: [],
    historyFuture: [],
    lastError: null,

    loadDocument: (document) => {
      const duplicate = validateLayout(document).issues.find((i) => i.code === 'DUPLICATE_ID');
      if (duplicate) {
        logger.warn('STORE', `loadDocument rejected: ${duplicate.message}`);
        set({ lastError: duplicate.message });
        return;
      }
      set({ document, historyPast: [], historyFuture: [], lastError: null });
    },

    setText: (id, text) =>
      commit(`setText ${id}`, (root) => {
        const node = requireNode(root, id);
        if ('rejected' in node) return node;
        if (node.type !== 'Label' && node.type !== 'Button') {
          return rejected(`"${id}" is a ${node.type} and has no text`);
        }
        return mapNode(root, id, (n) => {
          if (n.type === 'Label') return n.text.text === text ? n : { ...n, text: { ...n.text, text } };
          if (n.type === 'Button') {
            return n.button.text === text ? n : { ...n, button: { ...n.button, text } };
          }
          return n;
        });
      }),

    updateTransform: (id, patch) =>
      commit(`updateTransform ${id}`, (root) => {
        const node = requireNode(root, id);
        if ('rejected' in node) return node;
        const nextId = patch.id;
        if (nextId !== undefined && nextId !== id && nextId !== '' && findNode(root, nextId)) {
          return rejected(`id "${nextId}" is already in use`);
        }
        const transform = patchTransform(node.transform, patch);
        if ('rejected' in transform) return transform;
        return mapNode(root, id, (n) => ({ ...n, transform }));
      }),

    setImage: (id, image) =>
      commit(`setImage ${id}`, (root) => {
        const node = requireNode(root, id);
        if ('rejected' in node) return node;
        if (node.type === 'Label') return rejected(`"${id}" is a Label and has no image`);
        return mapNode(root, id, (n) => {
          switch (n.type) {
            case 'Container':
              return { ...n, background: image };
            case 'Image':
              return { ...n, image };
            case 'Button':
              return { ...n, button: { ...n.button, normalImage: image } };
            default:
              return n;
          }
        });
      }),

    insertNode: (parentId, node, index) =>
      commit(`insertNode into ${parentId}`, (root) => {
        const parent = requireNode(root, parentId);
        if ('rejected' in parent) return parent;
        if (parent.type !== 'Container') {
          return rejected(`"${parentId}" is a ${parent.type} and cannot hold children`);
        }
        const existing = new Set(collectIds(root));
        const incoming = collectIds(node);
        const clash = incoming.find((nid, i) => existing.has(nid) || incoming.indexOf(nid) !== i);
        if (clash !== undefined) return rejected(`id "${clash}" is already in use`);
        return insertChild(root, parentId, node, index);
      }),

    removeNode: (id) =>
      commit(`removeNode ${id}`, (root) => {
        if (root.transform.id === id) return rejected('the root node cannot be removed');
        const node = requireNode(root, id);
        if ('rejected' in node) return node;
        return removeNode(root, id);
      }),

    moveNode: (id, toIndex) =>
      commit(`moveNode ${id}`, (root) => {
        if (root.transform.id === id) return rejected('the root node has no siblings');
        const node = requireNode(root, id);
        if ('rejected' in node) return node;
        return moveChild(root, id, toIndex);
      }),

    undo: () =>
      set((s): Partial<HudLayoutStore> => {
        const entry = s.historyPast[s.historyPast.length - 1];
        if (!s.document || !entry) return {};
        return {
          document: { ...s.document, root: entry.before },
          historyPast: s.historyPast.slice(0, -1),
          historyFuture: [entry, ...s.historyFuture],
        };
      }),

    redo: () =>
      set((s): Partial<HudLayoutStore> => {
        const [entry, ...rest] = s.historyFuture;
        if (!s.document || !entry) return {};
        return {
          document: { ...s.document, root: entry.after },
          historyPast: [...s.historyPast, entry],
          historyFuture: rest,
        };
      }),

    toRon: (options) => {
      const { document } = get();
      return document ? serializeLayout(document, options) : null;
    },
  };
});

// Convenience hooks
export function useHudDocument(): LayoutDocument | null {
  return useHudLayoutStore((s) => s.document);
}

export function useHudNode(id: NodeId): LayoutNode | undefined {
  return useHudLayoutStore((s) => (s.document ? findNode(s.document.root, id) : undefined));
}

export function useHudEditActions(): Pick<
  HudLayoutActions,
  'setText' | 'updateTransform' | 'setImage' | 'insertNode' | 'removeNode' | 'moveNode'
> {
  return useHudLayoutStore(
    useShallow((s) => ({
      setText: s.setText,
      updateTransform: s.updateTransform,
      setImage: s.setImage,
      insertNode: s.insertNode,
      removeNode: s.removeNode,
      moveNode: s.moveNode,
    })),
  );
}

export function useHudHistoryActions(): Pick<HudLayoutActions, 'undo' | 'redo'> {
  return useHudLayoutStore(useShallow((s) => ({ undo: s.undo, redo: s.redo })));
}
