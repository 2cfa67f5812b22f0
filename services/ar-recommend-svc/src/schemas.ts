import type { FastifySchema } from 'fastify';

const errorResponseSchema = {
  type: 'object',
  required: ['code', 'message'],
  properties: {
    code: { type: 'string' },
    message: { type: 'string' },
    details: { type: 'object', additionalProperties: true }
  }
} as const;

const recommendedAssessmentSchema = {
  type: 'object',
  required: ['name', 'url', 'adaptive_support', 'description', 'duration', 'remote_support', 'test_type'],
  properties: {
    name: { type: 'string' },
    url: { type: 'string' },
    adaptive_support: { type: 'string' },
    description: { type: 'string' },
    duration: { type: 'integer', minimum: 0 },
    remote_support: { type: 'string' },
    test_type: {
      type: 'array',
      items: { type: 'string' }
    }
  }
} as const;

export const recommendSchema: FastifySchema = {
  body: {
    type: 'object',
    additionalProperties: false,
    required: ['query'],
    properties: {
      query: { type: 'string', minLength: 1, maxLength: 5000 },
      top_k: { type: 'integer', minimum: 1, maximum: 50, default: 20 },
      final_count: { type: 'integer', minimum: 5, maximum: 10, default: 10 }
    }
  },
  response: {
    200: {
      type: 'object',
      required: ['recommended_assessments'],
      properties: {
        recommended_assessments: {
          type: 'array',
          items: recommendedAssessmentSchema
        }
      }
    },
    400: errorResponseSchema,
    503: errorResponseSchema
  }
};

const dependencyHealthSchema = {
  type: 'object',
  properties: {
    index: { type: 'object', additionalProperties: true },
    embedding: { type: 'object', additionalProperties: true },
    ranking: { type: 'object', additionalProperties: true },
    cache: { type: 'object', additionalProperties: true }
  }
} as const;

export const healthSchema: FastifySchema = {
  response: {
    200: {
      type: 'object',
      required: ['status', 'message'],
      properties: {
        status: { type: 'string' },
        message: { type: 'string' },
        dependencies: dependencyHealthSchema
      }
    },
    503: {
      type: 'object',
      required: ['status', 'message'],
      properties: {
        status: { type: 'string' },
        message: { type: 'string' },
        dependencies: dependencyHealthSchema
      }
    }
  }
};
