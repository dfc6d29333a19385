/**
 * Asset Resolver
 *
 * Confirms both logo assets are present and readable, and reads their
 * intrinsic geometry once at startup. Renders re-check readability through
 * `assertAssetReadable` since assets can disappear while the worker runs.
 */

import {
  AssetMissingError,
  JobFailureError,
  describeError,
  type LogoAsset,
  type LogoRole,
  type LogoSettings,
  type ResolvedAssets,
} from '@brandcast/core';
import { createLogger, isReadable, type Logger } from '@brandcast/utils';
import { FFProbe, findVideoStream, parseDuration, type FFProbeResult } from './probes/ffprobe.js';

export async function assertAssetReadable(path: string): Promise<void> {
  if (!(await isReadable(path))) {
    throw new AssetMissingError(path);
  }
}

export class AssetResolver {
  private readonly logger: Logger;

  constructor(
    private readonly ffprobe: FFProbe,
    parentLogger?: Logger
  ) {
    this.logger = createLogger({ module: 'asset-resolver' }, parentLogger);
  }

  /**
   * Resolve both logos. Throws AssetMissingError for the first unusable one.
   */
  async resolve(logos: { static: LogoSettings; animated: LogoSettings }): Promise<ResolvedAssets> {
    const staticAsset = await this.resolveAsset('static', logos.static.file);
    const animatedAsset = await this.resolveAsset('animated', logos.animated.file);
    return { static: staticAsset, animated: animatedAsset };
  }

  async resolveAsset(role: LogoRole, path: string): Promise<LogoAsset> {
    await assertAssetReadable(path);

    let result: FFProbeResult;
    try {
      result = await this.ffprobe.probe(path);
    } catch (error) {
      // Cancellation and transient failures keep their own meaning
      if (error instanceof JobFailureError && error.reason !== 'UNREADABLE') {
        throw error;
      }
      throw new AssetMissingError(path, describeError(error));
    }

    const stream = findVideoStream(result);
    const width = stream?.width ?? 0;
    const height = stream?.height ?? 0;
    if (width <= 0 || height <= 0) {
      throw new AssetMissingError(path, 'no picture stream with a usable size');
    }

    const asset: LogoAsset = role === 'animated'
      ? { role, path, width, height, duration: parseDuration(result.format?.duration) ?? undefined }
      : { role, path, width, height };

    this.logger.debug({ role, path, width, height }, 'Logo asset resolved');
    return asset;
  }
}
