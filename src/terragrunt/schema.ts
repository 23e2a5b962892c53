import { z } from 'zod';
import { ValidationError, type ValidationIssue } from '../errors.js';

/** Include path meaning "search ancestor directories for the parent terragrunt.hcl" */
export const FIND_IN_PARENT_FOLDERS = 'find_in_parent_folders()';

export const DEFAULT_CONF_PATH = '/tmp/terragrunt_vpc.hcl';

const stringList = (description: string) =>
  z.array(z.string()).readonly().default(() => []).describe(description);

const envVars = (description: string) =>
  z.record(z.string(), z.string()).readonly().default(() => ({})).describe(description);

export const IncludeSchema = z
  .object({
    // Loose union: the sentinel or any explicit path
    path: z
      .union([z.literal(FIND_IN_PARENT_FOLDERS), z.string().min(1)])
      .default(FIND_IN_PARENT_FOLDERS)
      .describe(
        `Special value '${FIND_IN_PARENT_FOLDERS}' to auto-discover the parent terragrunt.hcl, ` +
          'or a path to a specific parent directory/file.'
      )
  })
  .readonly();

export const HookSchema = z
  .object({
    name: z.string().describe('Name of the hook.'),
    commands: stringList('Terraform commands that trigger this hook (e.g. plan, apply).'),
    execute: stringList('The command to execute, argv-style.'),
    run_on_error: z
      .boolean()
      .default(false)
      .describe('Whether to run this hook when the Terraform command fails.'),
    working_dir: z
      .string()
      .nullable()
      .default(null)
      .describe('Working directory for the executed command.'),
    env_vars: envVars('Environment variables for the executed command.')
  })
  .readonly();

export const ExtraArgumentsSchema = z
  .object({
    name: z.string().describe('Name of this argument set.'),
    commands: stringList('Terraform commands these arguments apply to.'),
    arguments: stringList('Additional arguments passed to Terraform.'),
    optional_var_files: stringList('-var-file paths included when they exist.'),
    env_vars: envVars('Environment variables set when running those commands.')
  })
  .readonly();

export const TerraformSchema = z
  .object({
    source: z
      .string()
      .describe('Module source URL (git::https://..., ssh, local path), optionally pinned with ?ref=.'),
    include_in_copy: stringList('Extra paths copied alongside the module source.'),
    extra_arguments: z
      .array(ExtraArgumentsSchema)
      .readonly()
      .default(() => [])
      .describe('Extra CLI arguments and environment for specific commands.'),
    before_hook: z
      .array(HookSchema)
      .readonly()
      .default(() => [])
      .describe('Hooks run before specific Terraform commands.'),
    after_hook: z
      .array(HookSchema)
      .readonly()
      .default(() => [])
      .describe('Hooks run after specific Terraform commands.')
  })
  .readonly();

export const InputsSchema = z
  .object({
    vpc_name: z.string().default('production-vpc').describe('Human-readable name for the VPC.'),
    vpc_cidr: z.string().default('10.0.0.0/16').describe('CIDR block for the VPC.'),
    enable_dns_support: z
      .boolean()
      .default(true)
      .describe('Whether to enable DNS resolution in the VPC.'),
    public_subnets: z
      .array(z.string())
      .readonly()
      .default(() => ['10.0.1.0/24', '10.0.2.0/24'])
      .describe('CIDR blocks for public subnets.'),
    tags: z
      .record(z.string(), z.string())
      .readonly()
      .default(() => ({ project: 'web-app', environment: 'prod' }))
      .describe('Tags applied to created resources.')
  })
  .readonly();

export const TerragruntConfigSchema = z
  .object({
    include: IncludeSchema.default({}),
    terraform: TerraformSchema,
    inputs: InputsSchema.default({})
  })
  .readonly();

export const VpcRequestSchema = z
  .object({
    conf_path: z
      .string()
      .default(DEFAULT_CONF_PATH)
      .describe('Where the generated terragrunt.hcl is written. May start with ~.'),
    terragrunt: TerragruntConfigSchema
  })
  .readonly();

export type Include = z.output<typeof IncludeSchema>;
export type Hook = z.output<typeof HookSchema>;
export type ExtraArguments = z.output<typeof ExtraArgumentsSchema>;
export type Terraform = z.output<typeof TerraformSchema>;
export type Inputs = z.output<typeof InputsSchema>;
export type TerragruntConfig = z.output<typeof TerragruntConfigSchema>;
export type VpcRequest = z.output<typeof VpcRequestSchema>;

/**
 * Validates an untrusted payload against the VPC request schema.
 * Throws a ValidationError listing every offending field.
 */
export function parseVpcRequest(input: unknown): VpcRequest {
  return parseWith(VpcRequestSchema, input);
}

export function parseTerragruntConfig(input: unknown): TerragruntConfig {
  return parseWith(TerragruntConfigSchema, input);
}

function parseWith<T extends z.ZodTypeAny>(schema: T, input: unknown): z.output<T> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(toIssues(result.error));
  }
  return result.data;
}

function toIssues(error: z.ZodError): ValidationIssue[] {
  return error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '<root>',
    message: isMissing(issue) ? 'Field required' : issue.message
  }));
}

function isMissing(issue: z.ZodIssue): boolean {
  return issue.code === z.ZodIssueCode.invalid_type && issue.received === z.ZodParsedType.undefined;
}
