// schemas/composer-job-v1.ts
// Job bundle manifest (job.json) schema v1

export const COMPOSER_JOB_V1_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'pdf-composer-job/v1.schema.json',
  title: 'PDF Composer Job v1',
  type: 'object',
  required: ['schema', 'templateId'],
  properties: {
    schema: {
      const: 'pdf-composer-job/v1',
    },
    templateId: { type: 'string', minLength: 1 },
    data: {
      type: 'string',
      minLength: 1,
      description: 'JSON data file inside the bundle (e.g., data.json).',
    },
    tables: {
      type: 'object',
      description: 'Name in the data tree -> CSV table inside the bundle.',
      additionalProperties: { $ref: '#/$defs/tableInput' },
    },
  },
  additionalProperties: false,
  $defs: {
    tableInput: {
      type: 'object',
      required: ['path'],
      properties: {
        path: { type: 'string', minLength: 1 },
        options: {
          type: 'object',
          properties: {
            delimiter: { type: 'string', minLength: 1 },
            quote: { type: 'string', minLength: 1 },
          },
          additionalProperties: false,
        },
      },
      additionalProperties: false,
    },
  },
} as const;
