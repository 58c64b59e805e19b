import swaggerUi from 'swagger-ui-express';
import YAML from 'yaml';
import { z } from 'zod';
import type { Express } from 'express';
import { readConfigFile } from '../../infrastructure/field-catalog.js';

const openApiDocument = z
  .object({
    openapi: z.string(),
    info: z.object({ title: z.string() }).passthrough(),
    paths: z.record(z.string(), z.unknown()),
  })
  .passthrough();

export function loadOpenApiSpec() {
  return openApiDocument.parse(YAML.parse(readConfigFile('openapi.yaml')));
}

export function setupOpenAPI(app: Express): void {
  const spec = loadOpenApiSpec();

  app.use('/docs', swaggerUi.serve, swaggerUi.setup(spec, {
    customCss: '.swagger-ui .topbar { display: none }',
    customSiteTitle: spec.info.title,
  }));

  app.get('/openapi.json', (_req, res) => {
    res.json(spec);
  });
}
