import { SEARCH_SOURCES, TIME_RANGES } from '@radar/shared';
import { z } from 'zod';

export const sourceListSchema = z.array(z.enum(SEARCH_SOURCES)).min(1);

export const timeRangeSchema = z.enum(TIME_RANGES);

const paperSchema = z.object({
  kind: z.literal('paper'),
  source: z.literal('arxiv'),
  title: z.string().min(1),
  url: z.string(),
  authors: z.array(z.string()),
  abstract: z.string(),
  published: z.string(),
  pdfUrl: z.string().optional(),
  categories: z.array(z.string()),
});

const repositorySchema = z.object({
  kind: z.literal('repository'),
  source: z.literal('github'),
  title: z.string().min(1),
  url: z.string(),
  description: z.string(),
  stars: z.number(),
  language: z.string().nullable(),
  topics: z.array(z.string()),
  updated: z.string(),
});

const modelSchema = z.object({
  kind: z.literal('model'),
  source: z.enum(['huggingface', 'modelscope']),
  title: z.string().min(1),
  url: z.string(),
  description: z.string(),
  downloads: z.number(),
  likes: z.number(),
  tags: z.array(z.string()),
  updated: z.string().optional(),
});

export const searchResultSchema = z.discriminatedUnion('kind', [paperSchema, repositorySchema, modelSchema]);
