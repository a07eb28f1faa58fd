import fs from 'fs';
import { parse as parseYaml } from 'yaml';
import { configSchema, type ValidatedConfig } from './schema';

const ENV_PREFIX = 'OCCUPANCY_METER_';

type RawConfig = Record<string, unknown>;

interface EnvBinding {
  section: string;
  field: string;
  parse?: (value: string) => unknown;
}

const toInt = (value: string): number => parseInt(value, 10);
const toList = (value: string): string[] =>
  value.split(',').map((item) => item.trim()).filter((item) => item.length > 0);

const ENV_MAP: Record<string, EnvBinding> = {
  [`${ENV_PREFIX}REDIS_URL`]: { section: 'redis', field: 'url' },
  [`${ENV_PREFIX}MONGODB_URI`]: { section: 'mongodb', field: 'uri' },
  [`${ENV_PREFIX}MONGODB_COLLECTION`]: { section: 'mongodb', field: 'collectionName' },
  [`${ENV_PREFIX}STREAM_KEY`]: { section: 'stream', field: 'key' },
  [`${ENV_PREFIX}STREAM_CONSUMER_GROUP`]: { section: 'stream', field: 'consumerGroup' },
  [`${ENV_PREFIX}STREAM_CONSUMER_ID`]: { section: 'stream', field: 'consumerId' },
  [`${ENV_PREFIX}STREAM_BLOCK_MS`]: { section: 'stream', field: 'blockMs', parse: toInt },
  [`${ENV_PREFIX}STREAM_BATCH_SIZE`]: { section: 'stream', field: 'batchSize', parse: toInt },
  [`${ENV_PREFIX}DISCOVERY_SOURCES`]: { section: 'discovery', field: 'sources', parse: toList },
  [`${ENV_PREFIX}DISCOVERY_SOURCES_KEY`]: { section: 'discovery', field: 'sourcesKey' },
  [`${ENV_PREFIX}DISCOVERY_RESCAN_INTERVAL_MS`]: { section: 'discovery', field: 'rescanIntervalMs', parse: toInt },
  [`${ENV_PREFIX}STORE_KEY_PREFIX`]: { section: 'store', field: 'keyPrefix' },
  [`${ENV_PREFIX}LOG_LEVEL`]: { section: 'logging', field: 'level' },
  [`${ENV_PREFIX}HEALTH_ENABLED`]: { section: 'health', field: 'enabled', parse: (v) => v === 'true' },
  [`${ENV_PREFIX}HEALTH_PORT`]: { section: 'health', field: 'port', parse: toInt },
};

function isRecord(value: unknown): value is RawConfig {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function applyEnv(raw: RawConfig, binding: EnvBinding, value: string): void {
  const section = raw[binding.section];
  raw[binding.section] = {
    ...(isRecord(section) ? section : {}),
    [binding.field]: binding.parse ? binding.parse(value) : value,
  };
}

export function loadConfig(configPath?: string): ValidatedConfig {
  const filePath = configPath ?? process.env.CONFIG_PATH ?? '/etc/occupancy-meter/config.yaml';

  let raw: RawConfig = {};

  if (fs.existsSync(filePath)) {
    const content = fs.readFileSync(filePath, 'utf-8');
    const parsed: unknown = parseYaml(content);
    if (isRecord(parsed)) {
      raw = parsed;
    }
  }

  // Apply environment variable overrides
  for (const [envKey, binding] of Object.entries(ENV_MAP)) {
    const value = process.env[envKey];
    if (value !== undefined) {
      applyEnv(raw, binding, value);
    }
  }

  return configSchema.parse(raw);
}
