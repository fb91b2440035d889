// schemas/document-template-v1.ts
// Document Template Schema v1 (inheritable sections, overflow, headers/footers)

export const DOCUMENT_TEMPLATE_V1_SCHEMA = {
  $schema: 'http://json-schema.org/draft-07/schema#',
  $id: 'document-template/v1.schema.json',
  title: 'Document Template v1',
  type: 'object',
  required: ['templateId'],
  properties: {
    templateId: { type: 'string', minLength: 1 },
    description: { type: 'string' },
    baseTemplateId: {
      type: 'string',
      minLength: 1,
      description: 'Parent template id; may contain ${path} placeholders resolved from request data.',
    },
    sections: {
      type: 'array',
      items: { $ref: '#/$defs/section' },
    },
    excludedSections: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
    },
    sectionOverrides: {
      type: 'object',
      description: 'sectionId -> templatePath for inherited sections.',
      additionalProperties: { type: 'string', minLength: 1 },
    },
    includedFragments: {
      type: 'array',
      items: { type: 'string', minLength: 1 },
    },
    headerFooterConfig: { $ref: '#/$defs/headerFooterConfig' },
    metadata: { type: 'object' },
  },
  additionalProperties: false,
  $defs: {
    mappingType: {
      type: 'string',
      enum: ['direct', 'jsonpath', 'jsonata', 'custom'],
    },
    fieldMap: {
      type: 'object',
      additionalProperties: { type: 'string' },
    },
    section: {
      type: 'object',
      required: ['sectionId'],
      properties: {
        sectionId: { type: 'string', minLength: 1 },
        type: { type: 'string', enum: ['form-fill', 'templated-view'] },
        templatePath: { type: 'string', minLength: 1 },
        mappingType: { $ref: '#/$defs/mappingType' },
        fieldMappings: { $ref: '#/$defs/fieldMap' },
        fieldMappingGroups: {
          type: 'array',
          items: { $ref: '#/$defs/fieldMappingGroup' },
        },
        viewModelType: { type: 'string', minLength: 1 },
        condition: { type: 'string', minLength: 1 },
        overflowConfigs: {
          type: 'array',
          items: { $ref: '#/$defs/overflowConfig' },
        },
        order: { type: 'integer' },
      },
      additionalProperties: false,
    },
    fieldMappingGroup: {
      type: 'object',
      properties: {
        mappingType: { $ref: '#/$defs/mappingType' },
        fields: { $ref: '#/$defs/fieldMap' },
        basePath: { type: 'string', minLength: 1 },
        repeatingGroup: { $ref: '#/$defs/repeatingGroup' },
      },
      additionalProperties: false,
    },
    repeatingGroup: {
      type: 'object',
      required: ['fields'],
      properties: {
        prefix: { type: 'string' },
        suffix: { type: 'string' },
        startIndex: { type: 'integer' },
        indexSeparator: { type: 'string' },
        indexPosition: { type: 'string', enum: ['before', 'after'] },
        maxItems: { type: 'integer', minimum: 0 },
        fields: { $ref: '#/$defs/fieldMap' },
      },
      additionalProperties: false,
    },
    overflowConfig: {
      type: 'object',
      required: ['arrayPath', 'maxItemsInMain', 'itemsPerOverflowPage', 'addendumTemplatePath'],
      properties: {
        arrayPath: { type: 'string', minLength: 1 },
        mappingType: { $ref: '#/$defs/mappingType' },
        maxItemsInMain: { type: 'number' },
        itemsPerOverflowPage: { type: 'number' },
        addendumTemplatePath: { type: 'string', minLength: 1 },
        overflowIndicatorField: { type: 'string', minLength: 1 },
      },
      additionalProperties: false,
    },
    headerFooterConfig: {
      type: 'object',
      properties: {
        headers: {
          type: 'array',
          items: { $ref: '#/$defs/headerTemplate' },
        },
        footers: {
          type: 'array',
          items: { $ref: '#/$defs/footerTemplate' },
        },
        excludePages: {
          type: 'array',
          items: { type: 'integer', minimum: 0 },
          description: '0-based page indices that receive no header or footer.',
        },
      },
      additionalProperties: false,
    },
    headerTemplate: {
      type: 'object',
      required: ['renderType', 'content'],
      properties: {
        renderType: { type: 'string', minLength: 1 },
        content: { type: 'string' },
        alignment: { type: 'string' },
        marginTop: { type: 'number' },
        fontSize: { type: 'number', exclusiveMinimum: 0 },
        data: { type: 'object' },
      },
      additionalProperties: false,
    },
    footerTemplate: {
      type: 'object',
      required: ['renderType', 'content'],
      properties: {
        renderType: { type: 'string', minLength: 1 },
        content: { type: 'string' },
        alignment: { type: 'string' },
        marginBottom: { type: 'number' },
        fontSize: { type: 'number', exclusiveMinimum: 0 },
        includePageNumbers: { type: 'boolean' },
        pageNumberFormat: { type: 'string' },
        data: { type: 'object' },
      },
      additionalProperties: false,
    },
  },
} as const;
