import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import { ConfigError, FetchError, MissingFieldError, compileConfigDocument } from '@ngo-contacts/core';

import type { ContactExtractionService } from '../extraction/service.js';

const RecordsRequestSchema = z
  .object({
    organizations: z.record(z.string(), z.unknown()),
    continueOnError: z.boolean().default(false)
  })
  .strict();

export interface CreateServerOptions {
  readonly service: ContactExtractionService;
}

const isClientStatus = (status: number | undefined): status is number => {
  return status !== undefined && status >= 400 && status < 500;
};

const statusFor = (error: Error & { statusCode?: number }): number => {
  if (error instanceof ConfigError || error instanceof z.ZodError) {
    return 400;
  }
  if (error instanceof MissingFieldError) {
    return 422;
  }
  if (error instanceof FetchError) {
    return 502;
  }
  // Body parsing and content-type errors raised by Fastify itself.
  if (isClientStatus(error.statusCode)) {
    return error.statusCode;
  }
  return 500;
};

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const service = options.service;

  app.post('/records', async (request, reply) => {
    const body = RecordsRequestSchema.parse(request.body ?? {});
    const organizations = compileConfigDocument(body.organizations, 'request');
    const result = await service.extractRecords(organizations, { continueOnError: body.continueOnError });

    return reply.send({
      records: result.records,
      failures: result.failures
    });
  });

  app.setErrorHandler((error, _request, reply) => {
    const statusCode = statusFor(error);
    if (error instanceof z.ZodError) {
      const issues = error.issues.map((issue) => issue.message);
      return reply.status(statusCode).send({ error: issues.join('; '), issues });
    }
    if (error instanceof ConfigError) {
      return reply.status(statusCode).send({ error: error.message, issues: error.issues });
    }
    return reply.status(statusCode).send({ error: error.message });
  });

  return app;
};
