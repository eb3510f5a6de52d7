import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { performance } from 'perf_hooks';
import { z, ZodError } from 'zod';
import { logError } from '@toolsmith/common';
import {
  formatRunToolResult,
  toStatusMessage,
  ToolsmithError,
  type RunToolResult,
  type ToolService,
  type ToolsmithErrorCode,
} from '@toolsmith/forge';

export interface ApiResponse<T = unknown> {
  status: 'success' | 'error';
  message: string;
  data: T | null;
  /** Seconds. */
  executionTime: number;
}

const ENDPOINTS = [
  '/detect-intent',
  '/create-tool',
  '/run-tool',
  '/debug-tool',
  '/tools',
  '/install-tool',
  '/search-tools',
  '/tool-functions/:toolName',
];

const messageBody = z.object({
  message: z.string().min(1),
  userName: z.string().optional(),
  userId: z.string().optional(),
});

const createToolBody = z.object({
  toolName: z.string().min(1),
  details: z.string().optional(),
});

const runToolBody = z.object({
  toolName: z.string().min(1),
  message: z.string().min(1),
});

const debugToolBody = z.object({
  toolName: z.string().min(1),
  maxAttempts: z.number().int().positive().optional(),
});

const installToolBody = z
  .object({
    toolName: z.string().min(1).optional(),
    description: z.string().min(1).optional(),
    runAfterInstall: z.boolean().optional().default(false),
    message: z.string().optional(),
  })
  .refine((body) => body.toolName !== undefined || body.description !== undefined, {
    message: 'toolName or description is required',
  });

const searchToolsBody = z.object({
  query: z.string().optional().default(''),
  tags: z.array(z.string()).optional(),
});

const toolParams = z.object({ toolName: z.string().min(1) });

const listQuery = z.object({
  refresh: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

const HTTP_STATUS: Partial<Record<ToolsmithErrorCode, number>> = {
  TOOL_NOT_FOUND: 404,
  DEBUG_SESSION_BUSY: 409,
  SPECIFICATION_INCOMPLETE: 422,
  INVALID_TOOL_NAME: 400,
};

const RUN_STATUS: Record<RunToolResult['kind'], number> = {
  completed: 200,
  'not-found': 404,
  'no-function': 422,
  'missing-arguments': 422,
  'not-implemented': 501,
  failed: 500,
};

const elapsedSeconds = (start: number) => Number(((performance.now() - start) / 1000).toFixed(3));

function respond<T>(status: ApiResponse['status'], message: string, data: T | null, start: number): ApiResponse<T> {
  return { status, message, data, executionTime: elapsedSeconds(start) };
}

/**
 * HTTP front end over a ToolService. Every route answers with an ApiResponse envelope.
 */
export function buildServer(service: ToolService): FastifyInstance {
  const app = Fastify();
  void app.register(cors, { origin: '*' });

  app.setErrorHandler((error, request, reply) => {
    const start = performance.now();
    if (error instanceof ZodError) {
      const detail = error.issues.map((issue) => `${issue.path.join('.') || 'body'}: ${issue.message}`).join('; ');
      return reply.status(400).send(respond('error', `Invalid request: ${detail}`, null, start));
    }
    const { code, message } = toStatusMessage(error);
    const statusCode =
      error instanceof ToolsmithError ? (HTTP_STATUS[error.code] ?? 500) : (error.statusCode ?? 500);
    if (statusCode >= 500) logError(`[tool-server] ${request.method} ${request.url} failed: ${message}`);
    return reply.status(statusCode).send(respond('error', message, { code }, start));
  });

  app.get('/', async () => ({
    message: 'toolsmith - tool synthesis and invocation service',
    version: '0.1.0',
    endpoints: ENDPOINTS,
  }));

  app.get('/healthz', async () => ({ ok: true }));

  app.post('/detect-intent', async (request) => {
    const start = performance.now();
    const body = messageBody.parse(request.body);
    const outcome = await service.handleMessage(body.message);
    return respond(
      outcome.intentType === 'ERROR' ? 'error' : 'success',
      outcome.content,
      { intentType: outcome.intentType, toolName: outcome.toolName, toolExecutionTime: outcome.executionTime },
      start
    );
  });

  app.post('/create-tool', async (request) => {
    const start = performance.now();
    const body = createToolBody.parse(request.body);
    const message = await service.createTool(body.toolName, body.details ?? body.toolName);
    return respond(message.startsWith('Error') ? 'error' : 'success', message, { toolName: body.toolName }, start);
  });

  app.post('/run-tool', async (request, reply) => {
    const start = performance.now();
    const body = runToolBody.parse(request.body);
    const result = await service.runTool(body.toolName, body.message);
    return reply
      .status(RUN_STATUS[result.kind])
      .send(respond(result.kind === 'completed' ? 'success' : 'error', formatRunToolResult(result), result, start));
  });

  app.post('/debug-tool', async (request) => {
    const start = performance.now();
    const body = debugToolBody.parse(request.body);
    const result = await service.debugToolDetailed(body.toolName, { maxAttempts: body.maxAttempts });
    const message = result.success
      ? `Tool '${body.toolName}' passed after ${result.iterations} fix(es).`
      : `Tool '${body.toolName}' did not pass (${result.state}${result.reason ? `: ${result.reason}` : ''}).`;
    return respond(result.success ? 'success' : 'error', message, result, start);
  });

  app.get('/tools', async (request) => {
    const start = performance.now();
    const { refresh } = listQuery.parse(request.query);
    const tools = await service.listTools(refresh);
    return respond('success', `Found ${tools.length} installed tools`, { tools }, start);
  });

  app.post('/install-tool', async (request) => {
    const start = performance.now();
    const body = installToolBody.parse(request.body);

    let installed: { success: boolean; message: string; toolName: string | null };
    if (body.toolName !== undefined) {
      const result = await service.installToolByName(body.toolName);
      installed = { ...result, toolName: result.success ? body.toolName : null };
    } else {
      const outcome = await service.findAndInstallTool(body.description ?? '');
      installed = { success: outcome.toolName !== null, message: outcome.message, toolName: outcome.toolName };
    }

    if (!installed.success || installed.toolName === null) {
      return respond('error', installed.message, { toolName: installed.toolName }, start);
    }
    if (body.runAfterInstall && body.message) {
      const runResult = await service.runTool(installed.toolName, body.message);
      return respond(
        runResult.kind === 'completed' ? 'success' : 'error',
        `${installed.message}\n\n${formatRunToolResult(runResult)}`,
        { toolName: installed.toolName, runResult },
        start
      );
    }
    return respond('success', installed.message, { toolName: installed.toolName }, start);
  });

  app.post('/search-tools', async (request) => {
    const start = performance.now();
    const body = searchToolsBody.parse(request.body ?? {});
    if (!service.hasLibrary()) return respond('error', 'No tool library is configured.', { tools: [] }, start);
    const tools = await service.searchLibrary(body.query, body.tags);
    return respond('success', `Found ${tools.length} matching tools`, { tools }, start);
  });

  app.get('/tool-functions/:toolName', async (request) => {
    const start = performance.now();
    const { toolName } = toolParams.parse(request.params);
    const functions = await service.getToolFunctions(toolName);
    return respond('success', `Found ${functions.length} functions in tool '${toolName}'`, { functions }, start);
  });

  return app;
}
