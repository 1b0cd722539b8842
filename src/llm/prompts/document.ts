import { access, readFile } from 'fs/promises';
import { resolve } from 'path';
import { IoError } from '../../errors.js';
import { logger } from '../../utils/logger.js';
import { BUNDLED_TEMPLATE_PATH } from '../../utils/paths.js';

/**
 * Heading placed between the instructions and the script being documented
 */
export const SOURCE_HEADING = 'Hier is de Notebook.py:';

const PREVIEW_CHARS = 250;

/**
 * Generate the documentation prompt: instruction template followed by the raw source.
 * Pure; the source text is appended without escaping, empty source included.
 */
export function buildDocumentPrompt(template: string, sourceText: string): string {
  return `${template}\n\n${SOURCE_HEADING}\n\n${sourceText}`;
}

/**
 * Template locations tried in order: explicit path, ./templates/prompt.md, bundled template
 */
export function templateCandidates(cwd: string, explicitPath?: string): string[] {
  if (explicitPath) {
    return [resolve(cwd, explicitPath)];
  }
  return [resolve(cwd, 'templates', 'prompt.md'), BUNDLED_TEMPLATE_PATH];
}

/**
 * Read the instruction template
 */
export async function loadPromptTemplate(cwd: string, explicitPath?: string): Promise<string> {
  const candidates = templateCandidates(cwd, explicitPath);
  const found = await firstExisting(candidates);
  const templatePath = found ?? candidates[candidates.length - 1];

  let template: string;
  try {
    template = await readFile(templatePath, 'utf-8');
  } catch (error) {
    throw new IoError(templatePath, error);
  }

  logger.debug(`Loaded prompt template from ${templatePath}`);
  logger.debug(`Template preview:\n${template.slice(0, PREVIEW_CHARS)}`);

  return template;
}

/**
 * Read the script to document
 */
export async function readSourceFile(cwd: string, filePath: string): Promise<string> {
  const fullPath = resolve(cwd, filePath);
  try {
    return await readFile(fullPath, 'utf-8');
  } catch (error) {
    throw new IoError(fullPath, error);
  }
}

async function firstExisting(paths: string[]): Promise<string | undefined> {
  for (const path of paths) {
    try {
      await access(path);
      return path;
    } catch {
      continue;
    }
  }
  return undefined;
}
