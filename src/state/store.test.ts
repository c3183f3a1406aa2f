import { beforeEach, describe, expect, it, vi } from 'vitest';
import { LogLevel, logger } from '../core/logger';
import { parseLayout } from '../core/codec';
import { collectIds, findNode } from '../core/tree';
import { button, container, doc, image, label } from '../test.fixtures';
import type { LayoutNode, UiImage } from '../types';
import { MAX_HISTORY, useHudLayoutStore } from './store';

function resetStore() {
  useHudLayoutStore.setState({
    document: null,
    historyPast: [],
    historyFuture: [],
    lastError: null,
  });
}

function loadSample() {
  useHudLayoutStore.getState().loadDocument(
    doc(
      container('hud', [
        label('money', '£0'),
        container('time', [button('pause', { z: 1 }), button('play', { z: -1 })]),
        image('icon'),
      ]),
    ),
  );
}

function node(id: string): LayoutNode | undefined {
  const { document } = useHudLayoutStore.getState();
  return document ? findNode(document.root, id) : undefined;
}

function ids(): string[] {
  const { document } = useHudLayoutStore.getState();
  return document ? collectIds(document.root) : [];
}

const RED: UiImage = { kind: 'SolidColor', color: [1, 0, 0, 1] };

describe('HUD layout store', () => {
  beforeEach(() => {
    resetStore();
    loadSample();
  });

  describe('loadDocument', () => {
    it('refuses documents with duplicate ids and keeps the current one', () => {
      const before = useHudLayoutStore.getState().document;
      useHudLayoutStore
        .getState()
        .loadDocument(doc(container('root', [label('a', 'one'), label('a', 'two')])));
      expect(useHudLayoutStore.getState().document).toBe(before);
      expect(useHudLayoutStore.getState().lastError).toBe('id "a" already used at children[0]');
    });

    it('resets history and errors on success', () => {
      useHudLayoutStore.getState().setText('money', '£1');
      useHudLayoutStore.getState().setText('time', 'x');
      useHudLayoutStore.getState().loadDocument(doc(label('solo')));
      const s = useHudLayoutStore.getState();
      expect(s.historyPast).toEqual([]);
      expect(s.lastError).toBeNull();
      expect(ids()).toEqual(['solo']);
    });
  });

  describe('setText', () => {
    it('replaces label and button text', () => {
      const s = useHudLayoutStore.getState();
      s.setText('money', '£250');
      s.setText('pause', 'II');
      expect(node('money')).toMatchObject({ text: { text: '£250' } });
      expect(node('pause')).toMatchObject({ button: { text: 'II' } });
      expect(useHudLayoutStore.getState().historyPast.map((e) => e.label)).toEqual([
        'setText money',
        'setText pause',
      ]);
    });

    it('rejects containers, unknown and empty ids', () => {
      const s = useHudLayoutStore.getState();
      s.setText('time', 'x');
      expect(useHudLayoutStore.getState().lastError).toBe('"time" is a Container and has no text');
      s.setText('nope', 'x');
      expect(useHudLayoutStore.getState().lastError).toBe('no node with id "nope"');
      s.setText('', 'x');
      expect(useHudLayoutStore.getState().lastError).toBe('an id is required');
      expect(useHudLayoutStore.getState().historyPast).toEqual([]);
    });

    it('records nothing when the text is unchanged', () => {
      const before = useHudLayoutStore.getState().document;
      useHudLayoutStore.getState().setText('money', '£0');
      expect(useHudLayoutStore.getState().document).toBe(before);
      expect(useHudLayoutStore.getState().historyPast).toEqual([]);
    });

    it('logs rejected edits as warnings', () => {
      const sink = { error: vi.fn(), warn: vi.fn(), info: vi.fn(), debug: vi.fn() };
      logger.setSink(sink);
      logger.level = LogLevel.WARN;
      useHudLayoutStore.getState().setText('time', 'x');
      expect(sink.warn).toHaveBeenCalledWith(
        '[STORE] setText time rejected: "time" is a Container and has no text',
      );
    });
  });

  describe('updateTransform', () => {
    it('swaps draw order of two buttons', () => {
      const s = useHudLayoutStore.getState();
      s.updateTransform('pause', { z: -1 });
      s.updateTransform('play', { z: 1 });
      expect(node('pause')?.transform.z).toBe(-1);
      expect(node('play')?.transform.z).toBe(1);
    });

    it('renames a node unless the id is taken', () => {
      const s = useHudLayoutStore.getState();
      s.updateTransform('icon', { id: 'money' });
      expect(useHudLayoutStore.getState().lastError).toBe('id "money" is already in use');
      s.updateTransform('icon', { id: 'logo' });
      expect(useHudLayoutStore.getState().lastError).toBeNull();
      expect(node('logo')?.type).toBe('Image');
      expect(node('icon')).toBeUndefined();
    });

    it('refuses patches that would leave the transform unwritable', () => {
      const s = useHudLayoutStore.getState();
      s.updateTransform('icon', { width: undefined });
      expect(useHudLayoutStore.getState().lastError).toBe('transform field "width" cannot be cleared');
      s.updateTransform('icon', { x: Number.NaN });
      expect(useHudLayoutStore.getState().lastError).toBe('transform field "x" must be a finite number');
      s.updateTransform('icon', { tabOrder: 1.5 });
      expect(useHudLayoutStore.getState().lastError).toBe('tab order must be an integer');
      expect(useHudLayoutStore.getState().historyPast).toEqual([]);
      expect(node('icon')?.transform.width).toBe(10);
      expect(s.toRon()).not.toBeNull();
    });

    it('clears stretch when patched to undefined', () => {
      const s = useHudLayoutStore.getState();
      s.updateTransform('icon', { stretch: { kind: 'X', xMargin: 2 } });
      expect(node('icon')?.transform.stretch).toEqual({ kind: 'X', xMargin: 2 });
      s.updateTransform('icon', { stretch: undefined });
      expect(node('icon')?.transform).not.toHaveProperty('stretch');
      expect(useHudLayoutStore.getState().lastError).toBeNull();
    });
  });

  describe('setImage', () => {
    it('targets background, image or normal image by node type', () => {
      const s = useHudLayoutStore.getState();
      s.setImage('time', RED);
      s.setImage('icon', RED);
      s.setImage('play', RED);
      expect(node('time')).toMatchObject({ background: RED });
      expect(node('icon')).toMatchObject({ image: RED });
      expect(node('play')).toMatchObject({ button: { normalImage: RED } });
    });

    it('rejects labels', () => {
      useHudLayoutStore.getState().setImage('money', RED);
      expect(useHudLayoutStore.getState().lastError).toBe('"money" is a Label and has no image');
    });
  });

  describe('structure edits', () => {
    it('inserts into containers only and refuses duplicate ids', () => {
      const s = useHudLayoutStore.getState();
      s.insertNode('time', label('clock'), 0);
      expect(ids()).toEqual(['hud', 'money', 'time', 'clock', 'pause', 'play', 'icon']);

      s.insertNode('money', label('x'));
      expect(useHudLayoutStore.getState().lastError).toBe(
        '"money" is a Label and cannot hold children',
      );
      s.insertNode('hud', container('box', [label('play')]));
      expect(useHudLayoutStore.getState().lastError).toBe('id "play" is already in use');
      s.insertNode('hud', container('box', [label('y'), label('y')]));
      expect(useHudLayoutStore.getState().lastError).toBe('id "y" is already in use');
    });

    it('removes subtrees but never the root', () => {
      const s = useHudLayoutStore.getState();
      s.removeNode('time');
      expect(ids()).toEqual(['hud', 'money', 'icon']);
      s.removeNode('hud');
      expect(useHudLayoutStore.getState().lastError).toBe('the root node cannot be removed');
    });

    it('moves nodes among siblings', () => {
      const s = useHudLayoutStore.getState();
      s.moveNode('play', 0);
      expect(ids()).toEqual(['hud', 'money', 'time', 'play', 'pause', 'icon']);
      s.moveNode('hud', 1);
      expect(useHudLayoutStore.getState().lastError).toBe('the root node has no siblings');
    });
  });

  describe('history', () => {
    it('undoes and redoes edits in order', () => {
      const s = useHudLayoutStore.getState();
      s.setText('money', '£1');
      s.removeNode('icon');
      s.undo();
      expect(node('icon')).toBeDefined();
      expect(node('money')).toMatchObject({ text: { text: '£1' } });
      s.undo();
      expect(node('money')).toMatchObject({ text: { text: '£0' } });
      expect(useHudLayoutStore.getState().historyFuture).toHaveLength(2);

      s.redo();
      s.redo();
      expect(node('money')).toMatchObject({ text: { text: '£1' } });
      expect(node('icon')).toBeUndefined();
      expect(useHudLayoutStore.getState().historyFuture).toEqual([]);
    });

    it('clears the redo stack on a new edit', () => {
      const s = useHudLayoutStore.getState();
      s.setText('money', '£1');
      s.undo();
      s.setText('money', '£2');
      expect(useHudLayoutStore.getState().historyFuture).toEqual([]);
      s.redo();
      expect(node('money')).toMatchObject({ text: { text: '£2' } });
    });

    it('keeps at most MAX_HISTORY entries', () => {
      const s = useHudLayoutStore.getState();
      for (let i = 0; i <= MAX_HISTORY; i++) s.setText('money', `£${i + 1}`);
      expect(useHudLayoutStore.getState().historyPast).toHaveLength(MAX_HISTORY);
    });

    it('is a no-op with nothing to undo or redo', () => {
      const before = useHudLayoutStore.getState().document;
      useHudLayoutStore.getState().undo();
      useHudLayoutStore.getState().redo();
      expect(useHudLayoutStore.getState().document).toBe(before);
    });
  });

  describe('toRon', () => {
    it('serializes the current document', () => {
      useHudLayoutStore.getState().setText('money', '£7');
      const text = useHudLayoutStore.getState().toRon();
      expect(text).not.toBeNull();
      const again = parseLayout(text ?? '');
      expect(findNode(again.root, 'money')).toMatchObject({ text: { text: '£7' } });
      expect(again).toEqual(useHudLayoutStore.getState().document);
    });

    it('returns null and rejects edits without a document', () => {
      resetStore();
      const s = useHudLayoutStore.getState();
      expect(s.toRon()).toBeNull();
      s.setText('money', 'x');
      expect(useHudLayoutStore.getState().lastError).toBe('no document loaded');
    });
  });
});
