import express from 'express';
import { EncodingError, IOError, ValidationError } from '../../errors.js';
import { logger } from '../../logging/logging.js';
import { ensureParentDirectory, resolveConfPath } from '../../paths.js';
import { generateTerragruntHcl } from '../../terragrunt/converter.js';
import { parseVpcRequest, type TerragruntConfig } from '../../terragrunt/schema.js';
import { HTTP_SERVER_CONFIG } from './config.js';

/**
 * Renders a config and persists it, returning the text written.
 */
export type HclGenerator = (config: TerragruntConfig, outputFilePath: string) => Promise<string>;

/**
 * Routes config-creation requests: validation, path resolution, conversion.
 * Maps the error taxonomy onto HTTP status codes.
 */
export class ConfigCreationRouter {
  private generate: HclGenerator;

  constructor(generate: HclGenerator = generateTerragruntHcl) {
    this.generate = generate;
  }

  createRouter(): express.Router {
    const router = express.Router();
    router.post(HTTP_SERVER_CONFIG.vpcEndpoint, this.createHandler());
    return router;
  }

  /**
   * Returns Express middleware for POST /tf/vpc.
   */
  createHandler(): express.RequestHandler {
    return async (req, res) => {
      try {
        await this.createVpc(req, res);
      } catch (error) {
        this.handleError(error, res);
      }
    };
  }

  private async createVpc(req: express.Request, res: express.Response): Promise<void> {
    const payload = parseVpcRequest(req.body);

    const outputPath = resolveConfPath(payload.conf_path);
    await ensureParentDirectory(outputPath);

    const hclContent = await this.generate(payload.terragrunt, outputPath);
    logger.info({ hclPath: outputPath }, 'Generated Terragrunt configuration');

    res.json({
      hcl_path: outputPath,
      hcl: hclContent,
      payload
    });
  }

  private handleError(error: unknown, res: express.Response): void {
    if (error instanceof ValidationError) {
      logger.warn({ issues: error.issues }, 'Rejected invalid Terragrunt payload');
      res.status(422).json({ error: 'ValidationError', details: error.issues });
      return;
    }

    if (error instanceof IOError) {
      logger.error({ err: error }, 'Failed to write Terragrunt configuration');
      res.status(500).json({
        error: 'IOError',
        message: error.message,
        code: error.code,
        path: error.path
      });
      return;
    }

    if (error instanceof EncodingError) {
      logger.error({ err: error }, 'Failed to encode Terragrunt configuration');
      res.status(500).json({ error: 'EncodingError', message: error.message });
      return;
    }

    logger.error({ err: error }, 'Error handling config creation request');
    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error' });
    }
  }
}
