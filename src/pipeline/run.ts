import { isScriptdocError, RequestError, type ScriptdocError } from '../errors.js';
import type { CompletionClient } from '../llm/client.js';
import { buildDocumentPrompt, loadPromptTemplate, readSourceFile } from '../llm/prompts/document.js';
import { redactSecrets } from '../llm/redact.js';
import { decryptToken } from '../secrets/fernet.js';
import { loadConfigBundle, type KeyValueSource } from '../secrets/store.js';
import { logger } from '../utils/logger.js';

export type PipelineState =
  | 'start'
  | 'config-loaded'
  | 'credential-decrypted'
  | 'prompt-built'
  | 'response-received'
  | 'done';

export type PipelineOutcome =
  | { state: 'done'; text: string }
  | { state: 'failed'; stage: PipelineState; error: ScriptdocError };

export interface OutputSink {
  write(chunk: string): unknown;
}

export interface PipelineInput {
  /** Script to document */
  filePath: string;
  cwd?: string;
  envPath?: string;
  templatePath?: string;
  model?: string;
}

export interface PipelineDeps {
  client: CompletionClient;
  output: OutputSink;
  env?: KeyValueSource;
  packageRoot?: string;
}

/**
 * What is being attempted when leaving each state
 */
const STEP_LABELS: Record<PipelineState, string> = {
  start: 'Loading configuration',
  'config-loaded': 'Decrypting credential',
  'credential-decrypted': 'Building prompt',
  'prompt-built': 'Requesting completion',
  'response-received': 'Writing output',
  done: 'Pipeline',
};

/**
 * Run one documentation request end to end.
 *
 * The stages run strictly in order and the first classified failure ends the run;
 * nothing reaches the output sink unless every stage succeeded. Errors that are not
 * classified are programming faults and propagate.
 */
export async function runPipeline(input: PipelineInput, deps: PipelineDeps): Promise<PipelineOutcome> {
  const cwd = input.cwd ?? process.cwd();
  let state: PipelineState = 'start';
  let credential: string | undefined;

  const advance = (next: PipelineState) => {
    logger.debug(`Pipeline: ${state} -> ${next}`);
    state = next;
  };

  try {
    const bundle = await loadConfigBundle({
      envPath: input.envPath,
      cwd,
      env: deps.env,
      packageRoot: deps.packageRoot,
    });
    advance('config-loaded');

    credential = decryptToken(bundle.decryptionKey, bundle.encryptedCredential);
    advance('credential-decrypted');

    const sourceText = await readSourceFile(cwd, input.filePath);
    const template = await loadPromptTemplate(cwd, input.templatePath);
    const prompt = buildDocumentPrompt(template, sourceText);
    advance('prompt-built');

    const text = await deps.client.complete(credential, prompt, input.model);
    credential = undefined;
    advance('response-received');

    deps.output.write(text);
    advance('done');

    return { state: 'done', text };
  } catch (error) {
    if (!isScriptdocError(error)) {
      throw error;
    }
    const secrets = credential ? [credential] : [];
    logger.error(`${STEP_LABELS[state]} failed: ${redactSecrets(error.message, secrets)}`);
    if (error instanceof RequestError && error.detail) {
      logger.debug(`Response body: ${redactSecrets(error.detail, secrets)}`);
    }
    return { state: 'failed', stage: state, error };
  } finally {
    credential = undefined;
  }
}

export function exitCodeFor(outcome: PipelineOutcome): number {
  return outcome.state === 'done' ? 0 : 1;
}
