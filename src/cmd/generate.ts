import { readFile } from 'node:fs/promises';
import { IOError, ValidationError } from '../errors.js';
import { logger } from '../logging/logging.js';
import { ensureParentDirectory, resolveConfPath } from '../paths.js';
import { generateTerragruntHcl, renderTerragruntHcl } from '../terragrunt/converter.js';
import { parseVpcRequest } from '../terragrunt/schema.js';

export interface GenerateOptions {
  /** Render only; leave conf_path untouched */
  dryRun?: boolean;
}

export interface GenerateResult {
  hclPath: string;
  hcl: string;
  written: boolean;
}

/**
 * Offline counterpart of POST /tf/vpc: reads a request document from disk,
 * validates it and writes the HCL to its conf_path.
 */
export async function generateFromRequestFile(
  requestFile: string,
  options: GenerateOptions = {}
): Promise<GenerateResult> {
  const payload = parseVpcRequest(await readRequestDocument(requestFile));
  const hclPath = resolveConfPath(payload.conf_path);

  if (options.dryRun) {
    return { hclPath, hcl: renderTerragruntHcl(payload.terragrunt), written: false };
  }

  await ensureParentDirectory(hclPath);
  const hcl = await generateTerragruntHcl(payload.terragrunt, hclPath);
  logger.info({ hclPath }, 'Generated Terragrunt configuration');

  return { hclPath, hcl, written: true };
}

async function readRequestDocument(requestFile: string): Promise<unknown> {
  let text: string;
  try {
    text = await readFile(requestFile, 'utf-8');
  } catch (error) {
    throw new IOError(requestFile, error);
  }

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ValidationError([{ path: '<root>', message: `Malformed JSON: ${reason}` }]);
  }
}
