#!/usr/bin/env tsx

/**
 * Generate JSON Schema from the Zod output schemas
 *
 * Writes one JSON Schema per document kind (actor, object, activity) so the
 * aggregation layer can validate what it receives without depending on this
 * package.
 *
 * Usage:
 *   tsx scripts/generate-schema.ts
 *   npm run generate:schema
 */

import fs from 'fs';
import path from 'path';
import type { ZodTypeAny } from 'zod';
import { zodToJsonSchema } from 'zod-to-json-schema';
import { ActivitySchema, ActorSchema, ObjectSchema } from '../src/core/normalizer/Normalizer';

const OUTPUT_DIR = path.join(__dirname, '../schemas');

const DOCUMENTS: Array<{ name: string; schema: ZodTypeAny; description: string }> = [
  { name: 'Actor', schema: ActorSchema, description: 'ActivityStreams actor built from a Twitter user' },
  {
    name: 'ActivityObject',
    schema: ObjectSchema,
    description: 'ActivityStreams note, tag or share object built from a tweet',
  },
  { name: 'Activity', schema: ActivitySchema, description: 'ActivityStreams post activity built from a tweet' },
];

function generateSchemas() {
  console.log('🔨 Generating JSON Schema from Zod...');

  fs.mkdirSync(OUTPUT_DIR, { recursive: true });

  for (const document of DOCUMENTS) {
    const jsonSchema = zodToJsonSchema(document.schema, {
      name: document.name,
      target: 'jsonSchema7',
    });

    const schemaWithMetadata = {
      $schema: 'http://json-schema.org/draft-07/schema#',
      title: document.name,
      description: document.description,
      version: '1.0.0',
      ...jsonSchema,
    };

    const outputPath = path.join(OUTPUT_DIR, `${document.name}.schema.json`);
    fs.writeFileSync(outputPath, JSON.stringify(schemaWithMetadata, null, 2), 'utf-8');
    console.log(`✅ JSON Schema generated: ${outputPath}`);
  }
}

try {
  generateSchemas();
  process.exit(0);
} catch (error: unknown) {
  const err = error instanceof Error ? error : new Error(String(error));
  console.error('❌ Failed to generate JSON Schema:', err.message);
  if (err.stack) {
    console.error(err.stack);
  }
  process.exit(1);
}
