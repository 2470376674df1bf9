import { stat } from 'node:fs/promises';
import path from 'node:path';
import type { Request, Response } from 'express';

export type StaticTarget = { kind: 'file'; file: string } | { kind: 'index' } | { kind: 'invalid' };

/**
 * Maps a request path onto the static folder. Anything that would resolve
 * outside the folder (including encoded "..") is invalid.
 */
export function resolveStaticPath(root: string, requestPath: string): StaticTarget {
  let decoded: string;
  try {
    decoded = decodeURIComponent(requestPath);
  } catch {
    return { kind: 'invalid' };
  }
  if (decoded.includes('\0')) return { kind: 'invalid' };

  const rel = decoded.replace(/^\/+/, '');
  if (rel === '') return { kind: 'index' };

  const base = path.resolve(root);
  const full = path.resolve(base, rel);
  if (full !== base && !full.startsWith(base + path.sep)) return { kind: 'invalid' };
  if (full === base) return { kind: 'index' };
  return { kind: 'file', file: full };
}

async function isFile(p: string): Promise<boolean> {
  try {
    return (await stat(p)).isFile();
  } catch {
    return false;
  }
}

/** Serves the game UI; unknown paths fall back to index.html for client-side routing. */
export function makeStaticHandler(root: string) {
  const indexFile = path.join(path.resolve(root), 'index.html');

  return async (req: Request, res: Response) => {
    const target = resolveStaticPath(root, req.path);
    if (target.kind === 'invalid') {
      return res.status(404).send('Invalid path');
    }
    if (target.kind === 'file' && (await isFile(target.file))) {
      return res.sendFile(target.file);
    }
    if (await isFile(indexFile)) {
      return res.sendFile(indexFile);
    }
    return res.status(404).send('index.html not found');
  };
}
