/**
 * Health Routes
 * 
 * Health check and readiness probes.
 */

import type { FastifyPluginAsync } from 'fastify';
import { checkDatabaseHealth, type DatabaseHandle } from '@contacts-hub/core';

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  version: string;
  uptime: number;
  timestamp: string;
  checks: {
    database: CheckResult;
  };
}

interface CheckResult {
  status: 'pass' | 'fail';
  latencyMs?: number;
  error?: string;
}

export const healthRoutes: FastifyPluginAsync = async (fastify) => {
  // Basic liveness probe (fast, always returns 200 if running)
  fastify.get('/', {
    schema: {
      description: 'Basic liveness check',
      tags: ['Health'],
      response: {
        200: {
          type: 'object',
          properties: {
            status: { type: 'string' },
            timestamp: { type: 'string' },
          },
        },
      },
    },
  }, async (_request, reply) => {
    return reply.send({
      status: 'ok',
      timestamp: new Date().toISOString(),
    });
  });

  // Readiness probe (checks the database)
  fastify.get('/ready', {
    schema: {
      description: 'Readiness check with dependency status',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    const checks: HealthStatus['checks'] = {
      database: checkDatabase(fastify.db),
    };

    const allPassing = Object.values(checks).every(c => c.status === 'pass');

    const status: HealthStatus = {
      status: allPassing ? 'healthy' : 'unhealthy',
      version: process.env['npm_package_version'] || '1.0.0',
      uptime: process.uptime(),
      timestamp: new Date().toISOString(),
      checks,
    };

    return reply.status(allPassing ? 200 : 503).send(status);
  });

  // Simple live check for k8s
  fastify.get('/live', {
    schema: {
      description: 'Kubernetes liveness probe',
      tags: ['Health'],
    },
  }, async (_request, reply) => {
    return reply.status(200).send({ status: 'live' });
  });
};

function checkDatabase(handle: DatabaseHandle): CheckResult {
  const start = Date.now();
  if (!handle.sqlite.open) {
    return { status: 'fail', error: 'Database connection is closed' };
  }
  if (!checkDatabaseHealth(handle)) {
    return { status: 'fail', error: 'SELECT 1 failed' };
  }
  return {
    status: 'pass',
    latencyMs: Date.now() - start,
  };
}
