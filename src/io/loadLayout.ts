import { access, readFile, writeFile } from 'node:fs/promises';
import { resolve } from 'node:path';
import { z } from 'zod';
import type { LayoutDocument } from '../types';
import { parseLayout, serializeLayout } from '../core/codec';
import { LayoutFileError, LayoutValidationError, type ValidationIssue } from '../core/errors';
import { logger } from '../core/logger';
import type { RonWriterOptions } from '../core/ronWriter';
import { collectAssetRefs, countNodes } from '../core/tree';
import { validateLayout } from '../core/validate';

export const loadLayoutOptionsSchema = z.object({
  /** Run structural validation and throw on issues. */
  validate: z.boolean().default(true),
  /** Directory asset paths resolve against; when set, every referenced file must exist. */
  assetRoot: z.string().min(1).optional(),
});

export type LoadLayoutOptions = z.input<typeof loadLayoutOptionsSchema>;

export async function findMissingAssets(
  layout: LayoutDocument,
  assetRoot: string,
): Promise<ValidationIssue[]> {
  const refs = collectAssetRefs(layout.root);
  const checked = new Map<string, Promise<boolean>>();
  const exists = (path: string) => {
    let pending = checked.get(path);
    if (!pending) {
      pending = access(resolve(assetRoot, path)).then(
        () => true,
        () => false,
      );
      checked.set(path, pending);
    }
    return pending;
  };
  const results = await Promise.all(refs.map((ref) => exists(ref.asset.path)));
  return refs.flatMap((ref, i): ValidationIssue[] =>
    results[i]
      ? []
      : [
          {
            code: 'MISSING_ASSET',
            path: ref.nodePath,
            nodeId: ref.nodeId,
            message: `${ref.field}: "${ref.asset.path}" not found under ${assetRoot}`,
          },
        ],
  );
}

/** Read, decode and (by default) validate a layout file. */
export async function loadLayoutFile(
  path: string,
  options: LoadLayoutOptions = {},
): Promise<LayoutDocument> {
  const opts = loadLayoutOptionsSchema.parse(options);
  let source: string;
  try {
    source = await readFile(path, 'utf8');
  } catch (err) {
    throw new LayoutFileError(path, 'Cannot read layout', err);
  }

  const layout = parseLayout(source);
  logger.debug('LOADER', `Decoded ${countNodes(layout.root)} nodes from ${path}`);

  const issues: ValidationIssue[] = [];
  if (opts.validate) issues.push(...validateLayout(layout).issues);
  if (opts.assetRoot) issues.push(...(await findMissingAssets(layout, opts.assetRoot)));

  if (issues.length > 0) {
    logger.warn('LOADER', `${path} has ${issues.length} issue(s)`, issues);
    throw new LayoutValidationError(issues, path);
  }
  logger.info('LOADER', `Loaded layout ${path}`);
  return layout;
}

export async function saveLayoutFile(
  path: string,
  layout: LayoutDocument,
  options?: RonWriterOptions,
): Promise<void> {
  try {
    await writeFile(path, serializeLayout(layout, options), 'utf8');
  } catch (err) {
    throw new LayoutFileError(path, 'Cannot write layout', err);
  }
  logger.info('LOADER', `Saved layout ${path}`);
}
