/**
 * Fastify Server Factory
 * 
 * Creates and configures the Fastify instance with all plugins.
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import jwt from '@fastify/jwt';
import compress from '@fastify/compress';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { openDatabase, type DatabaseHandle } from '@contacts-hub/core';

import { config } from './config/index.js';
import { loggerOptions } from './lib/logger.js';
import { errorHandler } from './plugins/errorHandler.js';
import { database } from './plugins/database.js';
import { authenticate } from './plugins/authenticate.js';

// Routes
import { healthRoutes, authRoutes, userRoutes, contactRoutes } from './routes/index.js';

export interface CreateServerOptions {
  /** Use this database instead of opening `config.database.url` */
  database?: DatabaseHandle;
}

export async function createServer(options: CreateServerOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: loggerOptions,
    trustProxy: config.trustProxy,
    requestTimeout: 30000,
    bodyLimit: 1024 * 1024, // 1MB
    ignoreTrailingSlash: true,
  });

  // ============================================
  // Security plugins
  // ============================================
  
  await server.register(helmet, {
    contentSecurityPolicy: {
      directives: {
        defaultSrc: ["'self'"],
        styleSrc: ["'self'", "'unsafe-inline'"],
        imgSrc: ["'self'", 'data:', 'https:'],
        scriptSrc: ["'self'"],
      },
    },
  });

  await server.register(cors, {
    origin: config.corsOrigins,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  });

  // ============================================
  // Rate limiting
  // ============================================
  
  await server.register(rateLimit, {
    max: config.rateLimitMax,
    timeWindow: config.rateLimitWindow,
    errorResponseBuilder: (_request, context) => ({
      statusCode: 429,
      error: 'Too Many Requests',
      message: `Rate limit exceeded. Retry in ${Math.ceil(context.ttl / 1000)} seconds`,
      retryAfter: Math.ceil(context.ttl / 1000),
    }),
  });

  // ============================================
  // Performance
  // ============================================
  
  await server.register(compress, {
    encodings: ['gzip', 'deflate'],
  });

  // ============================================
  // Persistence
  // ============================================

  await server.register(database, {
    handle: options.database ?? openDatabase(config.database.url, {
      logQueries: config.logLevel === 'debug' || config.logLevel === 'trace',
    }),
  });

  // ============================================
  // Authentication
  // ============================================
  
  await server.register(jwt, {
    secret: config.jwtSecret,
  });

  await server.register(authenticate);

  // ============================================
  // API Documentation
  // ============================================
  
  if (config.enableSwagger) {
    await server.register(swagger, {
      openapi: {
        info: {
          title: 'Contacts Hub API',
          description: 'Role-gated contacts API',
          version: '1.0.0',
        },
        servers: [
          { url: `http://localhost:${config.port}`, description: 'Development' },
        ],
        components: {
          securitySchemes: {
            bearerAuth: {
              type: 'http',
              scheme: 'bearer',
              bearerFormat: 'JWT',
            },
          },
        },
      },
    });

    await server.register(swaggerUi, {
      routePrefix: '/docs',
      uiConfig: {
        docExpansion: 'list',
        deepLinking: true,
      },
    });
  }

  // ============================================
  // Error handling
  // ============================================
  
  await server.register(errorHandler);

  // ============================================
  // Routes
  // ============================================
  
  // Root route - API info
  server.get('/', async () => ({
    name: 'contacts-hub-api',
    version: '1.0.0',
    status: 'running',
    docs: config.enableSwagger ? '/docs' : null,
    health: '/health',
  }));
  
  // Public routes
  await server.register(healthRoutes, { prefix: '/health' });
  await server.register(authRoutes, { prefix: '/api/auth' });
  
  // Protected routes
  await server.register(userRoutes, { prefix: '/api/users' });
  await server.register(contactRoutes, { prefix: '/contacts' });

  return server;
}
