const elementSchema = {
  type: 'object',
  required: ['name', 'type'],
  properties: {
    name: { type: 'string', minLength: 1 },
    type: { type: 'string', minLength: 1 },
    className: { type: 'string', minLength: 1 },
    collection: { type: 'boolean' },
    collectionElementName: { type: 'string', minLength: 1 },
    required: { type: 'boolean' },
  },
  additionalProperties: false,
} as const

const kindSchema = {
  type: 'object',
  required: ['elements'],
  properties: {
    container: {
      type: 'object',
      required: ['name'],
      properties: {
        name: { type: 'string', minLength: 1 },
        attributes: {
          type: 'object',
          additionalProperties: { type: 'string' },
        },
      },
      additionalProperties: false,
    },
    elements: {
      type: 'array',
      items: elementSchema,
    },
  },
  additionalProperties: false,
} as const

export const schemaDocumentSchema = {
  type: 'object',
  properties: {
    documents: {
      type: 'object',
      additionalProperties: kindSchema,
    },
    complexTypes: {
      type: 'object',
      additionalProperties: kindSchema,
    },
  },
  additionalProperties: false,
} as const

export const projectConfigSchema = {
  type: 'object',
  properties: {
    schema: { type: 'string', minLength: 1 },
    kind: { type: 'string', minLength: 1 },
  },
  additionalProperties: true,
} as const
