#!/usr/bin/env node

/**
 * REST API server for glyphproof
 * Exposes the generator via HTTP endpoints
 */

import { createServer, IncomingMessage, ServerResponse } from 'http';
import { z } from 'zod';
import {
  ConfigurationError,
  ValidationError,
  isRecoverable,
  type ProofGenerator
} from '@glyphproof/core';
import { createDefaultGenerator } from '@glyphproof/data';
import { config } from 'dotenv';
import {
  ParagraphBodySchema,
  SentenceBodySchema,
  TextBodySchema,
  WordBodySchema,
  WordsBodySchema,
  formatIssues
} from './schemas.js';

// Parse environment variables
config();

const PORT = parseInt(process.env.PORT || '3000', 10);
const MAX_JSON_BODY_SIZE = 1 * 1024 * 1024; // 1 MiB

export class JsonBodyError extends Error {
  status: number;

  constructor(message: string, status = 400) {
    super(message);
    this.name = 'JsonBodyError';
    this.status = status;
  }
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

/**
 * Parse JSON body from request. An empty body counts as `{}`.
 */
async function parseJsonBody(req: IncomingMessage): Promise<unknown> {
  return new Promise((resolve, reject) => {
    let body = '';
    let received = 0;

    const contentLengthHeader = req.headers['content-length'];
    if (contentLengthHeader) {
      const contentLength = Number(contentLengthHeader);
      if (Number.isFinite(contentLength) && contentLength > MAX_JSON_BODY_SIZE) {
        reject(new JsonBodyError('Payload too large', 413));
        return;
      }
    }

    const abort = (error: JsonBodyError) => {
      req.destroy();
      reject(error);
    };

    req.on('data', (chunk: Buffer) => {
      received += chunk.length;
      if (received > MAX_JSON_BODY_SIZE) {
        abort(new JsonBodyError('Payload too large', 413));
        return;
      }
      body += chunk.toString();
    });

    req.on('end', () => {
      if (!body.trim()) {
        resolve({});
        return;
      }
      try {
        resolve(JSON.parse(body));
      } catch {
        reject(new JsonBodyError('Invalid JSON'));
      }
    });

    req.on('error', (err) => {
      reject(err instanceof JsonBodyError ? err : new JsonBodyError(String(err), 400));
    });
  });
}

function validate<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const result = schema.safeParse(body);
  if (!result.success) {
    throw new JsonBodyError(`Invalid request body: ${formatIssues(result.error)}`);
  }
  return result.data;
}

/** HTTP status for an error raised while handling a request */
export function statusForError(error: unknown): number {
  if (error instanceof JsonBodyError) return error.status;
  if (error instanceof ValidationError || error instanceof ConfigurationError) return 400;
  // Only reaches here with raiseErrors set
  if (isRecoverable(error)) return 422;
  return 500;
}

const API_DOCS = {
  name: 'glyphproof REST API',
  version: '0.1.0',
  endpoints: {
    'GET /health': 'Health check',
    'GET /api/vocabs': 'Available vocabularies',
    'POST /api/word': 'One word (body: {glyphs?, vocab?, case?, seed?, randomness?, topK?, ...criteria})',
    'POST /api/words': 'Word list (body: word options + {wordCount?, minWords?, maxWords?, numberProbability?, capFirst?})',
    'POST /api/sentence': 'Sentence (body: words options + {punctuate?, punctuationRandomness?})',
    'POST /api/paragraph': 'Paragraph (body: sentence options + {sentenceCount?, sentenceSeparator?})',
    'POST /api/text': 'Text (body: paragraph options + {paragraphCount?, paragraphSeparator?})'
  },
  examples: {
    word: { url: '/api/word', body: { glyphs: 'HAMBURGEFONTSIVhamburgefontsiv', minLength: 5 } },
    sentence: { url: '/api/sentence', body: { vocab: 'es_sample', seed: 7 } }
  }
};

const POST_ROUTES: Record<string, (generator: ProofGenerator, body: unknown) => unknown> = {
  '/api/word': (generator, body) => ({ word: generator.word(validate(WordBodySchema, body)) }),
  '/api/words': (generator, body) => ({ words: generator.words(validate(WordsBodySchema, body)) }),
  '/api/sentence': (generator, body) => ({ sentence: generator.sentence(validate(SentenceBodySchema, body)) }),
  '/api/paragraph': (generator, body) => ({ paragraph: generator.paragraph(validate(ParagraphBodySchema, body)) }),
  '/api/text': (generator, body) => ({ text: generator.text(validate(TextBodySchema, body)) })
};

/**
 * Route a parsed request. Throws on bad input; see statusForError.
 */
export function routeRequest(
  generator: ProofGenerator,
  method: string,
  pathname: string,
  body: unknown = {}
): ApiResponse {
  if (method === 'GET') {
    if (pathname === '/health') {
      return { status: 200, body: { status: 'ok', timestamp: new Date().toISOString() } };
    }
    if (pathname === '/api') {
      return { status: 200, body: API_DOCS };
    }
    if (pathname === '/api/vocabs') {
      const vocabs = generator.listVocabs().map(name => {
        const table = generator.getVocab(name);
        return { name, language: table.language, bicameral: table.bicameral, size: table.size };
      });
      return { status: 200, body: { vocabs, default: generator.defaultVocab ?? null } };
    }
  }

  const handler = POST_ROUTES[pathname];
  if (handler) {
    if (method !== 'POST') {
      return { status: 405, body: { error: 'Method not allowed' } };
    }
    return { status: 200, body: handler(generator, body) };
  }

  return { status: 404, body: { error: 'Not found' } };
}

/**
 * Send JSON response
 */
function sendJson(res: ServerResponse, data: unknown, status = 200, requestId?: string): void {
  const json = JSON.stringify(data);
  res.writeHead(status, { 'Content-Type': 'application/json' });
  res.end(json);
  if (requestId) {
    console.log(`[${requestId}] Response sent: ${json.length} bytes, status ${status}`);
  }
}

/**
 * Build the request listener around one generator
 */
export function createRequestHandler(generator: ProofGenerator) {
  return async function handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const requestId = Math.random().toString(36).substring(7);
    const startTime = Date.now();
    const url = new URL(req.url || '/', `http://${req.headers.host ?? 'localhost'}`);
    const method = req.method ?? 'GET';

    console.log(`[${requestId}] START ${method} ${url.pathname}`);

    // CORS headers
    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    // Handle OPTIONS for CORS preflight
    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      console.log(`[${requestId}] END OPTIONS ${url.pathname} - ${Date.now() - startTime}ms`);
      return;
    }

    try {
      const body = method === 'POST' ? await parseJsonBody(req) : undefined;
      const { status, body: payload } = routeRequest(generator, method, url.pathname, body);
      sendJson(res, payload, status, requestId);
      console.log(`[${requestId}] END ${url.pathname} - ${Date.now() - startTime}ms`);
    } catch (error) {
      const status = statusForError(error);
      if (status >= 500) {
        console.error(`[${requestId}] Request error:`, error);
      }
      const message = error instanceof Error ? error.message : 'Internal server error';
      sendJson(res, { error: message }, status, requestId);
      console.log(`[${requestId}] END ${url.pathname} ERROR - ${Date.now() - startTime}ms`);
    }
  };
}

/**
 * Start the server
 */
async function main(): Promise<void> {
  process.on('unhandledRejection', (reason) => {
    console.error('UNHANDLED REJECTION:', reason);
  });

  const generator = createDefaultGenerator({
    vocab: process.env.GLYPHPROOF_VOCAB || undefined,
    glyphs: process.env.GLYPHPROOF_GLYPHS || undefined
  });
  console.log(`Loaded vocabs: ${generator.listVocabs().join(', ')}`);

  const server = createServer(createRequestHandler(generator));

  server.listen(PORT, '0.0.0.0', () => {
    console.log(`glyphproof API server listening on http://0.0.0.0:${PORT}`);
    console.log(`Health check: http://0.0.0.0:${PORT}/health`);
    console.log(`API docs: http://0.0.0.0:${PORT}/api`);
  });

  // Graceful shutdown
  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      console.log(`${signal} received, shutting down gracefully...`);
      server.close(() => {
        console.log('Server closed');
        process.exit(0);
      });
    });
  }
}

// Run server if this is the entry point
if (import.meta.url === `file://${process.argv[1]}`) {
  main().catch((error) => {
    console.error(`FATAL: ${error}`);
    process.exit(2);
  });
}
