import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { fileURLToPath } from 'node:url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = path.dirname(__filename);

export const FIXTURES_DIR = path.join(__dirname, 'fixtures');

/**
 * Parsed contents of a JSON file under test/fixtures.
 */
export function loadFixture(name: string): unknown {
  return JSON.parse(fs.readFileSync(path.join(FIXTURES_DIR, name), 'utf-8'));
}

export function loadJsonObject(name: string): Record<string, unknown> {
  const value = loadFixture(name);
  if (value === null || typeof value !== 'object' || Array.isArray(value)) {
    throw new Error(`Fixture ${name} is not a JSON object`);
  }
  return { ...value };
}

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'tg-config-api-'));
}

export function removeTempDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export const MINIMAL_SOURCE = 'git::https://example.com/m.git?ref=v1.0.0';

export const DEFAULT_INPUTS_HCL = `inputs {
  vpc_name = "production-vpc"
  vpc_cidr = "10.0.0.0/16"
  enable_dns_support = true
  public_subnets = ["10.0.1.0/24", "10.0.2.0/24"]
  tags = {
    project = "web-app"
    environment = "prod"
  }
}
`;

export const MINIMAL_HCL = `include {
  path = "find_in_parent_folders()"
}

terraform {
  source = "${MINIMAL_SOURCE}"
  include_in_copy = []
}

${DEFAULT_INPUTS_HCL}`;
