export const dependencyTableSchema = {
  $schema: 'https://json-schema.org/draft/2020-12/schema',
  $id: 'https://pinset.dev/schema/dependency-table.json',
  title: 'Dependency table',
  type: 'object',
  additionalProperties: false,
  required: ['dependencies'],
  properties: {
    dependencies: {
      type: 'array',
      items: {
        type: 'object',
        additionalProperties: false,
        required: ['name', 'version'],
        properties: {
          name: { type: 'string' },
          version: { type: 'string' },
          integrityHash: { type: ['string', 'null'] },
        },
      },
    },
  },
} as const;
