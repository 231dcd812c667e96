import { fileURLToPath } from 'url';

export const DEFAULT_IMAGE_TAG = 'codeloop-python';

// images/ sits at the package root, two levels above both src/sandbox and dist/sandbox
export const DEFAULT_RECIPE_DIR = fileURLToPath(new URL('../../images/python', import.meta.url));

export interface ImageDescriptor {
  tag: string;
  /** Build context directory; must contain `dockerfile`. */
  contextDir: string;
  dockerfile: string;
}

export function imageDescriptor(tag: string, contextDir: string, dockerfile = 'Dockerfile'): ImageDescriptor {
  return { tag, contextDir, dockerfile };
}

export function descriptorKey(d: ImageDescriptor): string {
  return `${d.tag}@${d.contextDir}/${d.dockerfile}`;
}
