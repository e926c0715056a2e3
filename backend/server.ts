import express from 'express';
import type { Response } from 'express';
import cors from 'cors';
import path from 'path';
import morgan from 'morgan';
import { z } from 'zod';

import { loadConfig, type AppConfig } from './config';
import { createPool, PgDocumentStore, type DocumentStore } from './db';
import {
  FUNCTION_DECLARATIONS,
  FunctionArgumentsError,
  UnknownFunctionError,
  callFunction,
} from './function_calling';
import { functionCallInputSchema } from './schema';
import { UserService } from './services/user';

export interface AppDependencies {
  config: AppConfig;
  store: DocumentStore;
  userService: UserService;
}

// Error response utility function
interface ErrorResponse {
  success: false;
  message: string;
  error_code?: string;
  details?: unknown;
  timestamp: string;
}

function createErrorResponse(
  message: string,
  error?: unknown,
  errorCode?: string
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    message,
    timestamp: new Date().toISOString()
  };

  if (errorCode) {
    response.error_code = errorCode;
  }

  if (error instanceof Error) {
    response.details = {
      name: error.name,
      message: error.message,
      stack: error.stack
    };
  } else if (error) {
    response.details = error;
  }

  return response;
}

export function createApp({ config, store, userService }: AppDependencies) {
  const app = express();

  // Middleware setup
  app.use(cors({
    origin: config.FRONTEND_URL,
    credentials: true,
  }));

  app.use(express.json({ limit: '1mb' }));

  // Morgan logging for better development experience
  if (config.NODE_ENV !== 'test') {
    app.use(morgan(':method :url :status :res[content-length] - :response-time ms'));
  }

  // Compiled chat UI script, then avatars and images
  app.get('/static/js/chat-ui.js', (req, res, next) => {
    res.sendFile(path.join(__dirname, '..', 'frontend', 'chat-ui.js'), (error) => {
      if (error) {
        next(error);
      }
    });
  });
  app.use('/static', express.static(config.PUBLIC_DIR));

  // ===== MODEL ENDPOINTS =====

  /*
    Character model lookup
    found -> 200, missing -> 404, store failure -> 503
  */
  const sendModel = async (userId: string, res: Response) => {
    const lookup = await userService.findModel(userId);

    switch (lookup.kind) {
      case 'found':
        res.set('Access-Control-Allow-Origin', '*');
        res.json(lookup.model);
        return;
      case 'not_found':
        res.status(404).json(createErrorResponse('Character was not found. Double-check the name and try again.', null, 'MODEL_NOT_FOUND'));
        return;
      case 'error':
        res.status(503).json(createErrorResponse('Character lookup failed', lookup.error, 'MODEL_LOOKUP_FAILED'));
        return;
    }
  };

  app.get('/api/models/:user_id', async (req, res) => {
    await sendModel(req.params.user_id, res);
  });

  // Legacy route, always the configured default user
  app.get('/get_model', async (req, res) => {
    await sendModel(userService.defaultUserId, res);
  });

  // ===== FUNCTION CALLING ENDPOINTS =====

  app.get('/api/functions', (req, res) => {
    res.json({ functions: FUNCTION_DECLARATIONS });
  });

  /*
    Invoke a chat function on behalf of the tool-calling loop
    Body: { user_id?, args? }
  */
  app.post('/api/functions/:name', async (req, res) => {
    try {
      const { user_id, args } = functionCallInputSchema.parse(req.body ?? {});
      const result = await callFunction(userService, req.params.name, user_id ?? userService.defaultUserId, args);

      res.json({ result: result.reply, html: result.html });
    } catch (error) {
      if (error instanceof UnknownFunctionError) {
        res.status(404).json(createErrorResponse(error.message, null, 'FUNCTION_NOT_FOUND'));
        return;
      }
      if (error instanceof FunctionArgumentsError) {
        res.status(400).json(createErrorResponse(error.message, error.issues, 'VALIDATION_ERROR'));
        return;
      }
      if (error instanceof z.ZodError) {
        res.status(400).json(createErrorResponse('Invalid input data', error.errors, 'VALIDATION_ERROR'));
        return;
      }
      console.error('Function call error:', error);
      res.status(500).json(createErrorResponse('Internal server error', error, 'INTERNAL_SERVER_ERROR'));
    }
  });

  // ===== VERSION & HEALTH =====

  app.get('/api/version', (req, res) => {
    res.json({ version: config.APP_VERSION });
  });

  /*
    Health check endpoint
    Returns server status and database connectivity
  */
  app.get('/api/health', async (req, res) => {
    try {
      await store.ping();
      res.json({
        status: 'ok',
        timestamp: new Date().toISOString(),
        database: 'connected'
      });
    } catch (error) {
      res.status(500).json({
        status: 'error',
        timestamp: new Date().toISOString(),
        database: 'disconnected',
        error: error instanceof Error ? error.message : String(error)
      });
    }
  });

  // ===== SPA ROUTING =====

  // Catch-all route for the chat page (serves index.html outside /api and /static)
  app.get(/^(?!\/(?:api|static)(?:\/|$)).*/, (req, res) => {
    res.sendFile(path.join(config.PUBLIC_DIR, 'index.html'));
  });

  return app;
}

// Start the server
if (require.main === module) {
  const config = loadConfig();
  const pool = createPool(config);
  const store = new PgDocumentStore(pool);
  const app = createApp({ config, store, userService: new UserService(store, config) });

  app.listen(config.PORT, '0.0.0.0', () => {
    console.log(`Server running on port ${config.PORT} and listening on 0.0.0.0`);
    console.log(`Environment: ${config.NODE_ENV}`);
    console.log(`Database connection: ${config.DATABASE_URL ? 'Using DATABASE_URL' : 'Using individual DB params'}`);
  });
}
