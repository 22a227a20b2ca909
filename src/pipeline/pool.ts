/**
 * On-disk media pool, partitioned by aspect ratio:
 *   {root}/{ratio}/{contentId}.mp4
 *
 * Assets persist across runs. Hidden files are in-progress writes and are never
 * listed.
 */
import * as fs from 'fs';
import * as path from 'path';
import type { AspectRatio } from '../media/aspect.js';
import type { ContentId } from '../utils/hash.js';

export interface MediaAsset {
  path: string;
  contentId: ContentId;
  aspectRatio: AspectRatio;
}

const ASSET_EXT = '.mp4';

export class MediaPool {
  readonly root: string;

  constructor(root: string) {
    this.root = path.resolve(root);
  }

  partitionDir(ratio: AspectRatio): string {
    return path.join(this.root, ratio);
  }

  pathFor(ratio: AspectRatio, contentId: ContentId): string {
    return path.join(this.partitionDir(ratio), `${contentId}${ASSET_EXT}`);
  }

  /** Assets of one partition, sorted by path so listing order is stable. */
  async list(ratio: AspectRatio): Promise<MediaAsset[]> {
    const dir = this.partitionDir(ratio);
    let entries: fs.Dirent[];
    try {
      entries = await fs.promises.readdir(dir, { withFileTypes: true });
    } catch (err) {
      if (isMissing(err)) return [];
      throw err;
    }
    return entries
      .filter(e => e.isFile() && e.name.endsWith(ASSET_EXT) && !e.name.startsWith('.'))
      .map(e => e.name)
      .sort()
      .map(name => ({
        path: path.join(dir, name),
        contentId: name.slice(0, -ASSET_EXT.length),
        aspectRatio: ratio,
      }));
  }

  async count(ratio: AspectRatio): Promise<number> {
    return (await this.list(ratio)).length;
  }

  async hasAssets(ratio: AspectRatio): Promise<boolean> {
    return (await this.count(ratio)) > 0;
  }
}

export function isMissing(err: unknown): boolean {
  return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}
