import type { Handle } from '../transport/types.js';

/**
 * Hands out the lowest unused non-negative handle, the way the kernel
 * numbers file descriptors.
 */
export class HandleAllocator {
  private inUse = new Set<Handle>();

  allocate(): Handle {
    let handle = 0;
    while (this.inUse.has(handle)) {
      handle++;
    }
    this.inUse.add(handle);
    return handle;
  }

  release(handle: Handle): void {
    this.inUse.delete(handle);
  }

  has(handle: Handle): boolean {
    return this.inUse.has(handle);
  }

  get size(): number {
    return this.inUse.size;
  }
}
