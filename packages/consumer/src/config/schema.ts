import { z } from 'zod';

export const configSchema = z.object({
  redis: z.object({
    url: z.string().url(),
  }),
  mongodb: z.object({
    uri: z.string(),
    collectionName: z.string().default('occupancy_records'),
  }),
  stream: z.object({
    key: z.string().default('occupancy:events'),
    consumerGroup: z.string().default('occupancy-group'),
    consumerId: z.string().default(`consumer-${process.pid}`),
    blockMs: z.number().int().positive().default(500),
    batchSize: z.number().int().positive().default(100),
  }).default({}),
  discovery: z.object({
    sources: z.array(z.string().min(1)).default([]),
    sourcesKey: z.string().default('occupancy:sources'),
    rescanIntervalMs: z.number().int().positive().default(60_000),
  }).default({}),
  store: z.object({
    keyPrefix: z.string().default('occupancy:'),
  }).default({}),
  logging: z.object({
    level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  }).default({}),
  health: z.object({
    enabled: z.boolean().default(true),
    port: z.number().int().positive().default(9090),
  }).default({}),
});

export type ValidatedConfig = z.infer<typeof configSchema>;
