import { dirname, resolve } from 'path';
import { fileURLToPath } from 'url';

/**
 * Root of the installed package (the directory holding package.json and templates/).
 * Resolves the same from src/utils and dist/utils.
 */
export const PACKAGE_ROOT = resolve(dirname(fileURLToPath(import.meta.url)), '..', '..');

export const BUNDLED_TEMPLATE_PATH = resolve(PACKAGE_ROOT, 'templates', 'prompt.md');
