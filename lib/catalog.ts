/**
 * Katalog verileri (senaryolar, personalar, ses kayıtları)
 * config/ altındaki JSON dosyalarından bir kez okunur ve zod ile doğrulanır.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod';
import { ConfigurationError } from './errors';
import type { PersonaCatalog, ScenarioCatalog } from '@/types/conversation.types';
import type { VoiceRegistry } from '@/types/voice.types';

export const DEFAULT_CATALOG_DIR = path.resolve(__dirname, '..', 'config');

const roleSchema = z.enum(['agent', 'user']);
const genderSchema = z.enum(['male', 'female']);
const providerSchema = z.enum(['elevenlabs', 'google_cloud', 'coqui']);

const ScenarioCatalogSchema = z.object({
  weights: z.record(z.number().min(0).max(1)),
  scenarios: z.record(z.object({
    description: z.string().min(1),
    flow: z.string(),
    commonIntents: z.array(z.string()),
    typicalDuration: z.string()
  }))
});

const nameList = z.array(z.string().min(1)).min(1);

const PersonaCatalogSchema = z.object({
  agentNames: nameList,
  maleNames: nameList,
  femaleNames: nameList,
  fillers: z.array(z.string()),
  telecom: z.object({
    packages: z.array(z.string()),
    internetSpeeds: z.array(z.string()),
    services: z.array(z.string()),
    commonIssues: z.array(z.string())
  })
});

const providerVoiceSchema = z.object({
  provider: providerSchema,
  voice: z.string().min(1)
});

const VoiceRegistrySchema = z.object({
  defaults: z.object({ agent: z.string(), user: z.string() }),
  baseline: z.object({
    provider: providerSchema,
    voices: z.object({ male: z.string(), female: z.string() })
  }),
  voices: z.record(providerVoiceSchema.extend({
    role: roleSchema,
    gender: genderSchema,
    fallbacks: z.array(providerVoiceSchema).default([]),
    characteristics: z.string().default('')
  }))
}).superRefine((registry, ctx) => {
  for (const [role, voiceId] of Object.entries(registry.defaults)) {
    if (!registry.voices[voiceId]) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['defaults', role],
        message: `Varsayılan ses kayıtta yok: ${voiceId}`
      });
    }
  }
});

export interface Catalog {
  scenarios: ScenarioCatalog;
  personas: PersonaCatalog;
  voices: VoiceRegistry;
}

function readJson<T>(dir: string, fileName: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const filePath = path.join(dir, fileName);
  let raw: unknown;

  try {
    raw = JSON.parse(fs.readFileSync(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Katalog dosyası okunamadı: ${filePath}`, [
      error instanceof Error ? error.message : String(error)
    ]);
  }

  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Katalog dosyası geçersiz: ${filePath}`,
      parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  return parsed.data;
}

const cache = new Map<string, Catalog>();

/**
 * Katalogları yükle (dizin başına bir kez)
 */
export function loadCatalog(dir: string = DEFAULT_CATALOG_DIR): Catalog {
  const cached = cache.get(dir);
  if (cached) return cached;

  const catalog: Catalog = {
    scenarios: readJson(dir, 'scenarios.json', ScenarioCatalogSchema),
    personas: readJson(dir, 'personas.json', PersonaCatalogSchema),
    voices: readJson(dir, 'voices.json', VoiceRegistrySchema)
  };

  cache.set(dir, catalog);
  return catalog;
}
