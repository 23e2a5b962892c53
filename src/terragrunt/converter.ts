import { writeFile } from 'node:fs/promises';
import { IOError } from '../errors.js';
import type { HclTree } from '../hcl/ast.js';
import { reverseTransform } from '../hcl/reverse-transform.js';
import { writes } from '../hcl/writer.js';
import {
  FIND_IN_PARENT_FOLDERS,
  type ExtraArguments,
  type Hook,
  type TerragruntConfig
} from './schema.js';

/**
 * Builds the plain tree that is handed to the HCL encoder.
 *
 * `include.path` is always forced to `find_in_parent_folders()`; an explicit path on the
 * validated config is ignored. Empty hook and extra-argument lists are left out so the
 * terraform block only carries the nested blocks that were actually configured.
 */
export function normalizeTerragruntConfig(config: TerragruntConfig): HclTree {
  const { terraform, inputs } = config;

  return {
    include: { path: FIND_IN_PARENT_FOLDERS },
    terraform: {
      source: terraform.source,
      include_in_copy: [...terraform.include_in_copy],
      ...nonEmpty('extra_arguments', terraform.extra_arguments.map(normalizeExtraArguments)),
      ...nonEmpty('before_hook', terraform.before_hook.map(normalizeHook)),
      ...nonEmpty('after_hook', terraform.after_hook.map(normalizeHook))
    },
    inputs: {
      vpc_name: inputs.vpc_name,
      vpc_cidr: inputs.vpc_cidr,
      enable_dns_support: inputs.enable_dns_support,
      public_subnets: [...inputs.public_subnets],
      tags: { ...inputs.tags }
    }
  };
}

function normalizeHook(hook: Hook): HclTree {
  return {
    name: hook.name,
    commands: [...hook.commands],
    execute: [...hook.execute],
    run_on_error: hook.run_on_error,
    working_dir: hook.working_dir,
    env_vars: { ...hook.env_vars }
  };
}

function normalizeExtraArguments(extra: ExtraArguments): HclTree {
  return {
    name: extra.name,
    commands: [...extra.commands],
    arguments: [...extra.arguments],
    optional_var_files: [...extra.optional_var_files],
    env_vars: { ...extra.env_vars }
  };
}

function nonEmpty(key: string, items: HclTree[]): HclTree {
  return items.length > 0 ? { [key]: items } : {};
}

/**
 * Renders a validated config as HCL2 text without touching the filesystem.
 */
export function renderTerragruntHcl(config: TerragruntConfig): string {
  return writes(reverseTransform(normalizeTerragruntConfig(config)));
}

/**
 * Renders a validated config and writes it to `outputFilePath`, replacing any existing file.
 * The parent directory must already exist.
 *
 * @returns the HCL text that was written
 */
export async function generateTerragruntHcl(
  config: TerragruntConfig,
  outputFilePath: string
): Promise<string> {
  const hclContent = renderTerragruntHcl(config);

  try {
    await writeFile(outputFilePath, hclContent, { encoding: 'utf-8', flag: 'w' });
  } catch (error) {
    throw new IOError(outputFilePath, error);
  }

  return hclContent;
}
