/**
 * Configuration Management Module
 *
 * Centralized configuration with environment variable support and validation.
 * Every calibration constant of the decision model lives here.
 */

import * as dotenv from 'dotenv';
import fs from 'fs';
import path from 'path';
import { RepairGateError, type CalibrationWeights, type ModelId, type ModelProfile } from '@repairgate/shared-types';

// Load environment variables:
// 1) parent directory .env (if present) for shared local settings
// 2) local .env
const rootEnvPath = path.resolve(process.cwd(), '..', '.env');
const localEnvPath = path.resolve(process.cwd(), '.env');
if (fs.existsSync(rootEnvPath)) {
  dotenv.config({ path: rootEnvPath });
}
dotenv.config({ path: localEnvPath });

/**
 * Static capability data of a known model family
 */
export type ModelProfileSpec = Omit<ModelProfile, 'name'>;

/**
 * Known model families. `default` is the required fallback entry.
 */
export const MODEL_PROFILES: Record<ModelId, ModelProfileSpec> = {
  'qwen2.5-coder': {
    id: 'qwen2.5-coder',
    maxTokens: 16384,
    temperature: 0.2,
    baseCapability: 0.85,
    contextWindow: 32768,
  },
  'deepseek-coder': {
    id: 'deepseek-coder',
    maxTokens: 16384,
    temperature: 0.2,
    baseCapability: 0.8,
    contextWindow: 16384,
  },
  codellama: {
    id: 'codellama',
    maxTokens: 8192,
    temperature: 0.3,
    baseCapability: 0.7,
    contextWindow: 16384,
  },
  'deepseek-r1': {
    id: 'deepseek-r1',
    maxTokens: 16384,
    temperature: 0.5,
    baseCapability: 0.75,
    contextWindow: 32768,
  },
  'granite-code': {
    id: 'granite-code',
    maxTokens: 8192,
    temperature: 0.2,
    baseCapability: 0.7,
    contextWindow: 8192,
  },
  mistral: {
    id: 'mistral',
    maxTokens: 8192,
    temperature: 0.4,
    baseCapability: 0.6,
    contextWindow: 32768,
  },
  default: {
    id: 'default',
    maxTokens: 8192,
    temperature: 0.2,
    baseCapability: 0.5,
    contextWindow: 8192,
  },
};

// Longest prefixes first so "deepseek-coder" is not taken for "deepseek-r1".
const MODEL_ALIASES: Array<[string, ModelId]> = [
  ['qwen2.5-coder', 'qwen2.5-coder'],
  ['qwen-coder', 'qwen2.5-coder'],
  ['deepseek-coder', 'deepseek-coder'],
  ['deepseek-r1', 'deepseek-r1'],
  ['granite-code', 'granite-code'],
  ['codellama', 'codellama'],
  ['code-llama', 'codellama'],
  ['mistral', 'mistral'],
];

/**
 * Resolve a free-form model name ("qwen2.5-coder:7b") to a capability profile.
 * Unknown names resolve to the `default` entry.
 */
export function resolveModelProfile(name: string): ModelProfile {
  const normalized = name.trim().toLowerCase();
  const match = MODEL_ALIASES.find(([alias]) => normalized.startsWith(alias));
  const spec = MODEL_PROFILES[match ? match[1] : 'default'];
  return { ...spec, name: name.trim() || spec.id };
}

/**
 * Application Configuration
 */
export interface Config {
  /** Decision model calibration weights */
  calibration: CalibrationWeights;

  decision: {
    /** REBUILD iff repairCost > rebuildThreshold * rebuildCost */
    rebuildThreshold: number;
    /** Below this the decision is reported as borderline */
    minSuccessProbability: number;
    /** Fraction of the threshold at which a REPAIR is reported as borderline */
    borderlineBand: number;
    /** Denominator clamp */
    epsilon: number;
  };

  rebuild: {
    /** Cost of rebuilding a single file */
    baselineCost: number;
    complexityMultiplier: number;
  };

  capability: {
    /** Token/context bonuses apply above this many units */
    baselineUnits: number;
    tokenBonusPerUnit: number;
    contextBonusPerUnit: number;
    /** Multiplied by the model temperature */
    temperaturePenalty: number;
    maxCapability: number;
  };

  history: {
    /** Scale of the (successRate - 0.5) adjustment */
    weight: number;
    decayFactor: number;
    minSamples: number;
    /** Newest records per category considered by the aggregate */
    windowSize: number;
    databasePath: string;
  };

  repair: {
    maxIterations: number;
    generationTimeoutMs: number;
    validationTimeoutMs: number;
    artifactsDir: string;
    defaultModel: string;
  };

  mre: {
    neighborDepth: number;
    /** Size cap for the whole-tree fallback */
    maxBytes: number;
    maxFiles: number;
  };

  sandbox: {
    /**
     * Shell template run for each phase. Placeholders: {workspace}, {image}, {command}
     */
    commandTemplate: string;
  };
}

/**
 * Get environment variable or throw error
 */
function getEnvVar(key: string, defaultValue?: string): string {
  const value = process.env[key];
  if (value === undefined) {
    if (defaultValue !== undefined) {
      return defaultValue;
    }
    throw new Error(`Missing required environment variable: ${key}`);
  }
  return value;
}

/**
 * Get integer from environment variable
 */
function getEnvNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = parseInt(value, 10);
  if (isNaN(num)) {
    console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

/**
 * Get float from environment variable
 */
function getEnvFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (value === undefined) {
    return defaultValue;
  }
  const num = Number.parseFloat(value);
  if (!Number.isFinite(num)) {
    console.warn(`[Config] Invalid number for ${key}, using default: ${defaultValue}`);
    return defaultValue;
  }
  return num;
}

/**
 * Load configuration from environment variables
 */
export function loadConfig(): Config {
  return {
    calibration: {
      gamma: getEnvFloat('CALIBRATION_GAMMA', 1.0),
      lambda: getEnvFloat('CALIBRATION_LAMBDA', 0.5),
      alpha: getEnvFloat('CALIBRATION_ALPHA', 0.4),
      beta: getEnvFloat('CALIBRATION_BETA', 0.3),
      gammaPrime: getEnvFloat('CALIBRATION_GAMMA_PRIME', 0.5),
      delta: getEnvFloat('CALIBRATION_DELTA', 0.2),
    },

    decision: {
      rebuildThreshold: getEnvFloat('REBUILD_THRESHOLD', 1.5),
      minSuccessProbability: getEnvFloat('MIN_SUCCESS_PROBABILITY', 0.3),
      borderlineBand: getEnvFloat('BORDERLINE_BAND', 0.8),
      epsilon: 1e-6,
    },

    rebuild: {
      baselineCost: getEnvFloat('REBUILD_BASELINE_COST', 25),
      complexityMultiplier: getEnvFloat('REBUILD_COMPLEXITY_MULTIPLIER', 2.0),
    },

    capability: {
      baselineUnits: getEnvNumber('CAPABILITY_BASELINE_UNITS', 8192),
      tokenBonusPerUnit: getEnvFloat('CAPABILITY_TOKEN_BONUS', 0.00001),
      contextBonusPerUnit: getEnvFloat('CAPABILITY_CONTEXT_BONUS', 0.00001),
      temperaturePenalty: getEnvFloat('CAPABILITY_TEMPERATURE_PENALTY', 0.2),
      maxCapability: getEnvFloat('CAPABILITY_MAX', 0.95),
    },

    history: {
      weight: getEnvFloat('HISTORY_WEIGHT', 0.3),
      decayFactor: getEnvFloat('HISTORY_DECAY_FACTOR', 0.9),
      minSamples: getEnvNumber('HISTORY_MIN_SAMPLES', 5),
      windowSize: getEnvNumber('HISTORY_WINDOW_SIZE', 1000),
      databasePath: getEnvVar('HISTORY_DATABASE_PATH', './repairgate-history.db'),
    },

    repair: {
      maxIterations: getEnvNumber('REPAIR_MAX_ITERATIONS', 5),
      generationTimeoutMs: getEnvNumber('GENERATION_TIMEOUT_MS', 120000), // 2 minutes
      validationTimeoutMs: getEnvNumber('VALIDATION_TIMEOUT_MS', 300000), // 5 minutes
      artifactsDir: getEnvVar('REPAIR_ARTIFACTS_DIR', './repairs'),
      defaultModel: getEnvVar('REPAIR_DEFAULT_MODEL', 'qwen2.5-coder:7b'),
    },

    mre: {
      neighborDepth: getEnvNumber('MRE_NEIGHBOR_DEPTH', 1),
      maxBytes: getEnvNumber('MRE_MAX_BYTES', 20 * 1024 * 1024),
      maxFiles: getEnvNumber('MRE_MAX_FILES', 500),
    },

    sandbox: {
      commandTemplate: getEnvVar(
        'SANDBOX_COMMAND_TEMPLATE',
        'docker run --rm --network none -v "{workspace}:/workspace" -w /workspace {image} sh -c "{command}"'
      ),
    },
  };
}

/**
 * Global configuration instance
 */
export const config: Config = loadConfig();

/**
 * Validate configuration
 */
export function validateConfig(cfg: Config = config): { valid: boolean; errors: string[] } {
  const errors: string[] = [];

  if (!(cfg.history.decayFactor > 0 && cfg.history.decayFactor < 1)) {
    errors.push(`HISTORY_DECAY_FACTOR must be in (0,1), got ${cfg.history.decayFactor}`);
  }
  if (cfg.history.minSamples < 1) {
    errors.push(`HISTORY_MIN_SAMPLES must be >= 1, got ${cfg.history.minSamples}`);
  }
  if (cfg.repair.maxIterations < 1) {
    errors.push(`REPAIR_MAX_ITERATIONS must be >= 1, got ${cfg.repair.maxIterations}`);
  }
  if (!(cfg.decision.rebuildThreshold > 0)) {
    errors.push(`REBUILD_THRESHOLD must be positive, got ${cfg.decision.rebuildThreshold}`);
  }
  if (!(cfg.rebuild.baselineCost > 0 && Number.isFinite(cfg.rebuild.baselineCost))) {
    errors.push(`REBUILD_BASELINE_COST must be positive, got ${cfg.rebuild.baselineCost}`);
  }
  if (!(cfg.capability.maxCapability > 0 && cfg.capability.maxCapability <= 1)) {
    errors.push(`CAPABILITY_MAX must be in (0,1], got ${cfg.capability.maxCapability}`);
  }
  if (cfg.mre.neighborDepth < 0) {
    errors.push(`MRE_NEIGHBOR_DEPTH must be >= 0, got ${cfg.mre.neighborDepth}`);
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Throw CONFIG_INVALID listing every problem `validateConfig` finds
 */
export function assertValidConfig(cfg: Config = config): void {
  const { valid, errors } = validateConfig(cfg);
  if (!valid) {
    throw new RepairGateError('CONFIG_INVALID', `Invalid configuration: ${errors.join('; ')}`, { errors });
  }
}
