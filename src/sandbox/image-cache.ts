import { ImageBuildError } from '../errors.js';
import { createLogger } from '../log.js';
import { descriptorKey, type ImageDescriptor } from './recipe.js';
import type { ImageRuntime } from './types.js';

const log = createLogger('IMAGE');

export interface ImageHandle {
  readonly tag: string;
  /** false when the image was already present on the runtime. */
  readonly built: boolean;
}

/**
 * Makes sure an image exists, building it at most once per descriptor.
 *
 * Concurrent `ensure` calls for the same descriptor share one in-flight
 * promise. Successful results stay for the life of the cache; failures are
 * forgotten as soon as they settle, so the next call tries again. Different
 * descriptors build independently.
 */
export class ImageCache {
  private static perRuntime = new WeakMap<ImageRuntime, ImageCache>();

  private ready = new Map<string, ImageHandle>();
  private inflight = new Map<string, Promise<ImageHandle>>();

  constructor(private runtime: ImageRuntime) {}

  /** The process-wide cache for a runtime. */
  static shared(runtime: ImageRuntime): ImageCache {
    let cache = ImageCache.perRuntime.get(runtime);
    if (!cache) {
      cache = new ImageCache(runtime);
      ImageCache.perRuntime.set(runtime, cache);
    }
    return cache;
  }

  ensure(descriptor: ImageDescriptor): Promise<ImageHandle> {
    const key = descriptorKey(descriptor);
    const ready = this.ready.get(key);
    if (ready) return Promise.resolve(ready);

    const pending = this.inflight.get(key);
    if (pending) {
      log.debug(`Waiting for in-flight build of ${descriptor.tag}`);
      return pending;
    }

    const build = this.resolve(descriptor)
      .then(handle => {
        this.ready.set(key, handle);
        return handle;
      })
      .finally(() => {
        this.inflight.delete(key);
      });
    this.inflight.set(key, build);
    return build;
  }

  private async resolve(descriptor: ImageDescriptor): Promise<ImageHandle> {
    let exists: boolean;
    try {
      exists = await this.runtime.imageExists(descriptor.tag);
    } catch (e) {
      throw new ImageBuildError(descriptor.tag, '', { cause: e });
    }
    if (exists) {
      log.debug(`Image ${descriptor.tag} already present`);
      return { tag: descriptor.tag, built: false };
    }

    log.info(`Building image ${descriptor.tag} from ${descriptor.contextDir}`);
    try {
      await this.runtime.buildImage(descriptor);
    } catch (e) {
      if (e instanceof ImageBuildError) {
        log.error(`Build of ${descriptor.tag} failed`, e.log);
        throw e;
      }
      throw new ImageBuildError(descriptor.tag, '', { cause: e });
    }
    return { tag: descriptor.tag, built: true };
  }
}
