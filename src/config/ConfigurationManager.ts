/**
 * Configuration Manager for engine settings and environment-specific configuration
 */

import { readFile } from 'fs/promises';
import { STAKE_TIER_ORDER } from '../models/StakePosition';
import type { TierDefinition } from '../models/StakePosition';

export const BPS_DENOMINATOR = 10_000;

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface AssetConfig {
  collateralAsset: string;
  settlementAsset: string;
  stakeAsset: string;
}

export interface AccountConfig {
  treasury: string;
  rewards: string;
}

export interface FeeConfig {
  feeBps: number;
  maxFeeBps: number;
  makerRebateBps: number;
}

/**
 * Fill reward paid to the taker in the stake asset, in bps of the filled quantity.
 * Zero turns the reward leg off.
 */
export interface RewardConfig {
  fillRewardBps: number;
}

export interface StakingConfig {
  tiers: TierDefinition[];
}

export interface MatchingConfig {
  admissionWindowMs: number;
  maxVersionRetries: number;
}

export interface OrderConfig {
  maxMultisigThreshold: number;
  commitmentTtlMs: number;
}

export interface EngineConfig {
  environment: 'development' | 'staging' | 'production' | 'test';
  version: string;
  logLevel: LogLevel;
  assets: AssetConfig;
  accounts: AccountConfig;
  fees: FeeConfig;
  rewards: RewardConfig;
  staking: StakingConfig;
  matching: MatchingConfig;
  orders: OrderConfig;
}

export interface ConfigValidationError {
  path: string;
  message: string;
  value?: unknown;
}

export interface ConfigValidationResult {
  isValid: boolean;
  errors: ConfigValidationError[];
}

export interface EnvironmentVariables {
  NODE_ENV?: string;
  LOG_LEVEL?: string;
  OTC_CONFIG_FILE?: string;
  OTC_FEE_BPS?: string;
  OTC_MAX_FEE_BPS?: string;
  OTC_MAKER_REBATE_BPS?: string;
  OTC_FILL_REWARD_BPS?: string;
  OTC_ADMISSION_WINDOW_MS?: string;
  OTC_MAX_VERSION_RETRIES?: string;
  OTC_COMMITMENT_TTL_MS?: string;
  [key: string]: string | undefined;
}

type EngineConfigOverrides = {
  [K in keyof EngineConfig]?: EngineConfig[K] extends object ? Partial<EngineConfig[K]> : EngineConfig[K];
};

const ENVIRONMENTS: readonly EngineConfig['environment'][] = ['development', 'staging', 'production', 'test'];
const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

/**
 * Default tier table. Silver is the 50% discount bracket at 1000 staked.
 */
export const DEFAULT_TIERS: readonly TierDefinition[] = [
  { tier: 'none', minStake: 0n, priorityWeight: 0, feeDiscountBps: 0 },
  { tier: 'bronze', minStake: 1n, priorityWeight: 1, feeDiscountBps: 500 },
  { tier: 'silver', minStake: 1_000n, priorityWeight: 2, feeDiscountBps: 5_000 },
  { tier: 'gold', minStake: 5_000n, priorityWeight: 3, feeDiscountBps: 6_000 },
  { tier: 'platinum', minStake: 25_000n, priorityWeight: 4, feeDiscountBps: 7_500 }
];

export function getDefaultConfiguration(): EngineConfig {
  return {
    environment: 'development',
    version: '1.0.0',
    logLevel: 'info',
    assets: {
      collateralAsset: 'COLLATERAL',
      settlementAsset: 'USDC',
      stakeAsset: 'OTCL'
    },
    accounts: {
      treasury: 'otc:treasury',
      rewards: 'otc:rewards'
    },
    fees: {
      feeBps: 100, // 1%
      maxFeeBps: 1_000,
      makerRebateBps: 2_000 // 20% of the taker fee
    },
    rewards: {
      fillRewardBps: 0
    },
    staking: {
      tiers: DEFAULT_TIERS.map(tier => ({ ...tier }))
    },
    matching: {
      admissionWindowMs: 0,
      maxVersionRetries: 3
    },
    orders: {
      maxMultisigThreshold: 16,
      commitmentTtlMs: 24 * 60 * 60 * 1000
    }
  };
}

export class ConfigurationManager {
  private config: EngineConfig;
  private readonly configFilePath?: string;
  private readonly env: EnvironmentVariables;

  constructor(configFilePath?: string, env: EnvironmentVariables = process.env) {
    this.env = env;
    this.configFilePath = configFilePath ?? env.OTC_CONFIG_FILE;

    // Initialize with default configuration
    this.config = getDefaultConfiguration();
  }

  /**
   * Loads configuration from file and environment variables
   */
  async loadConfiguration(): Promise<EngineConfig> {
    try {
      const fileConfig = this.configFilePath ? await this.loadConfigurationFromFile(this.configFilePath) : {};
      const envConfig = this.loadConfigurationFromEnvironment();

      // Environment takes precedence over the file
      const merged = this.mergeConfigurations(this.mergeConfigurations(getDefaultConfiguration(), fileConfig), envConfig);

      const validation = this.validateConfiguration(merged);
      if (!validation.isValid) {
        throw new Error(`Configuration validation failed: ${validation.errors.map(e => e.message).join(', ')}`);
      }

      this.config = merged;
      return this.getConfiguration();
    } catch (error) {
      const errorMessage = error instanceof Error ? error.message : 'Unknown error';
      throw new Error(`Failed to load configuration: ${errorMessage}`);
    }
  }

  /**
   * Gets the current configuration
   */
  getConfiguration(): EngineConfig {
    return this.mergeConfigurations(this.config, {});
  }

  /**
   * Gets a specific configuration section
   */
  getConfigSection<T extends keyof EngineConfig>(section: T): EngineConfig[T] {
    return this.getConfiguration()[section];
  }

  /**
   * Updates a configuration section; the result must validate
   */
  updateConfigSection<T extends keyof EngineConfig>(section: T, updates: EngineConfigOverrides[T]): void {
    const overrides: EngineConfigOverrides = {};
    overrides[section] = updates;
    const candidate = this.mergeConfigurations(this.config, overrides);

    const validation = this.validateConfiguration(candidate);
    if (!validation.isValid) {
      throw new Error(`Configuration update failed validation: ${validation.errors.map(e => e.message).join(', ')}`);
    }

    this.config = candidate;
  }

  /**
   * Validates the entire configuration
   */
  validateConfiguration(config: EngineConfig): ConfigValidationResult {
    const errors: ConfigValidationError[] = [];

    if (!ENVIRONMENTS.includes(config.environment)) {
      errors.push({
        path: 'environment',
        message: 'Environment must be development, staging, production, or test',
        value: config.environment
      });
    }

    if (!LOG_LEVELS.includes(config.logLevel)) {
      errors.push({ path: 'logLevel', message: 'Log level must be debug, info, warn, or error', value: config.logLevel });
    }

    errors.push(...this.validateAssetConfig(config.assets));
    errors.push(...this.validateAccountConfig(config.accounts));
    errors.push(...this.validateFeeConfig(config.fees));
    errors.push(...this.validateRewardConfig(config.rewards));
    errors.push(...this.validateStakingConfig(config.staking));
    errors.push(...this.validateMatchingConfig(config.matching));
    errors.push(...this.validateOrderConfig(config.orders));

    return {
      isValid: errors.length === 0,
      errors
    };
  }

  private loadConfigurationFromEnvironment(): EngineConfigOverrides {
    const env = this.env;
    const envConfig: EngineConfigOverrides = {};

    const environment = ENVIRONMENTS.find(candidate => candidate === env.NODE_ENV);
    if (environment) {
      envConfig.environment = environment;
    }

    const logLevel = LOG_LEVELS.find(candidate => candidate === env.LOG_LEVEL);
    if (logLevel) {
      envConfig.logLevel = logLevel;
    }

    const fees: Partial<FeeConfig> = {
      ...(env.OTC_FEE_BPS && { feeBps: parseInt(env.OTC_FEE_BPS, 10) }),
      ...(env.OTC_MAX_FEE_BPS && { maxFeeBps: parseInt(env.OTC_MAX_FEE_BPS, 10) }),
      ...(env.OTC_MAKER_REBATE_BPS && { makerRebateBps: parseInt(env.OTC_MAKER_REBATE_BPS, 10) })
    };
    if (Object.keys(fees).length > 0) {
      envConfig.fees = fees;
    }

    if (env.OTC_FILL_REWARD_BPS) {
      envConfig.rewards = { fillRewardBps: parseInt(env.OTC_FILL_REWARD_BPS, 10) };
    }

    const matching: Partial<MatchingConfig> = {
      ...(env.OTC_ADMISSION_WINDOW_MS && { admissionWindowMs: parseInt(env.OTC_ADMISSION_WINDOW_MS, 10) }),
      ...(env.OTC_MAX_VERSION_RETRIES && { maxVersionRetries: parseInt(env.OTC_MAX_VERSION_RETRIES, 10) })
    };
    if (Object.keys(matching).length > 0) {
      envConfig.matching = matching;
    }

    if (env.OTC_COMMITMENT_TTL_MS) {
      envConfig.orders = { commitmentTtlMs: parseInt(env.OTC_COMMITMENT_TTL_MS, 10) };
    }

    return envConfig;
  }

  /**
   * Reads a JSON configuration file. Tier stakes are written as decimal strings.
   */
  private async loadConfigurationFromFile(path: string): Promise<EngineConfigOverrides> {
    const raw: unknown = JSON.parse(await readFile(path, 'utf8'));
    if (!isRecord(raw)) {
      throw new Error(`Configuration file ${path} must contain a JSON object`);
    }

    const fileConfig: EngineConfigOverrides = {};
    const environment = ENVIRONMENTS.find(candidate => candidate === raw.environment);
    if (environment) fileConfig.environment = environment;
    const logLevel = LOG_LEVELS.find(candidate => candidate === raw.logLevel);
    if (logLevel) fileConfig.logLevel = logLevel;
    if (typeof raw.version === 'string') fileConfig.version = raw.version;

    if (isRecord(raw.assets)) fileConfig.assets = pickStrings(raw.assets, ['collateralAsset', 'settlementAsset', 'stakeAsset']);
    if (isRecord(raw.accounts)) fileConfig.accounts = pickStrings(raw.accounts, ['treasury', 'rewards']);
    if (isRecord(raw.fees)) fileConfig.fees = pickNumbers(raw.fees, ['feeBps', 'maxFeeBps', 'makerRebateBps']);
    if (isRecord(raw.rewards)) fileConfig.rewards = pickNumbers(raw.rewards, ['fillRewardBps']);
    if (isRecord(raw.matching)) fileConfig.matching = pickNumbers(raw.matching, ['admissionWindowMs', 'maxVersionRetries']);
    if (isRecord(raw.orders)) fileConfig.orders = pickNumbers(raw.orders, ['maxMultisigThreshold', 'commitmentTtlMs']);

    if (isRecord(raw.staking) && Array.isArray(raw.staking.tiers)) {
      fileConfig.staking = { tiers: raw.staking.tiers.map((entry: unknown, index: number) => parseTier(entry, index)) };
    }

    return fileConfig;
  }

  private mergeConfigurations(base: EngineConfig, override: EngineConfigOverrides): EngineConfig {
    const tiers = override.staking?.tiers ?? base.staking.tiers;
    return {
      environment: override.environment ?? base.environment,
      version: override.version ?? base.version,
      logLevel: override.logLevel ?? base.logLevel,
      assets: { ...base.assets, ...override.assets },
      accounts: { ...base.accounts, ...override.accounts },
      fees: { ...base.fees, ...override.fees },
      rewards: { ...base.rewards, ...override.rewards },
      staking: { tiers: tiers.map(tier => ({ ...tier })) },
      matching: { ...base.matching, ...override.matching },
      orders: { ...base.orders, ...override.orders }
    };
  }

  private validateAssetConfig(config: AssetConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    for (const key of ['collateralAsset', 'settlementAsset', 'stakeAsset'] as const) {
      if (!config[key] || config[key].trim().length === 0) {
        errors.push({ path: `assets.${key}`, message: `Asset ${key} is required`, value: config[key] });
      }
    }

    return errors;
  }

  private validateAccountConfig(config: AccountConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!config.treasury || config.treasury.trim().length === 0) {
      errors.push({ path: 'accounts.treasury', message: 'Treasury account is required', value: config.treasury });
    }

    if (!config.rewards || config.rewards.trim().length === 0) {
      errors.push({ path: 'accounts.rewards', message: 'Rewards account is required', value: config.rewards });
    } else if (config.rewards === config.treasury) {
      errors.push({ path: 'accounts.rewards', message: 'Rewards account must differ from the treasury account', value: config.rewards });
    }

    return errors;
  }

  private validateFeeConfig(config: FeeConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isInteger(config.maxFeeBps) || config.maxFeeBps < 0 || config.maxFeeBps > BPS_DENOMINATOR) {
      errors.push({
        path: 'fees.maxFeeBps',
        message: `Max fee must be an integer between 0 and ${BPS_DENOMINATOR} bps`,
        value: config.maxFeeBps
      });
    }

    if (!Number.isInteger(config.feeBps) || config.feeBps < 0 || config.feeBps > config.maxFeeBps) {
      errors.push({
        path: 'fees.feeBps',
        message: 'Fee must be an integer between 0 and the max fee',
        value: config.feeBps
      });
    }

    if (!Number.isInteger(config.makerRebateBps) || config.makerRebateBps < 0 || config.makerRebateBps > BPS_DENOMINATOR) {
      errors.push({
        path: 'fees.makerRebateBps',
        message: `Maker rebate must be an integer between 0 and ${BPS_DENOMINATOR} bps`,
        value: config.makerRebateBps
      });
    }

    return errors;
  }

  private validateRewardConfig(config: RewardConfig): ConfigValidationError[] {
    if (Number.isInteger(config.fillRewardBps) && config.fillRewardBps >= 0 && config.fillRewardBps <= BPS_DENOMINATOR) {
      return [];
    }
    return [{
      path: 'rewards.fillRewardBps',
      message: `Fill reward must be an integer between 0 and ${BPS_DENOMINATOR} bps`,
      value: config.fillRewardBps
    }];
  }

  private validateStakingConfig(config: StakingConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];
    const tiers = config.tiers;

    if (tiers.length === 0 || tiers[0].minStake !== 0n) {
      errors.push({ path: 'staking.tiers', message: 'Tier table must start with a tier at zero stake' });
    }

    tiers.forEach((tier, index) => {
      if (!Number.isInteger(tier.feeDiscountBps) || tier.feeDiscountBps < 0 || tier.feeDiscountBps > BPS_DENOMINATOR) {
        errors.push({
          path: `staking.tiers[${index}].feeDiscountBps`,
          message: `Fee discount must be an integer between 0 and ${BPS_DENOMINATOR} bps`,
          value: tier.feeDiscountBps
        });
      }
      if (!Number.isInteger(tier.priorityWeight) || tier.priorityWeight < 0) {
        errors.push({
          path: `staking.tiers[${index}].priorityWeight`,
          message: 'Priority weight must be a non-negative integer',
          value: tier.priorityWeight
        });
      }

      if (index === 0) return;
      const previous = tiers[index - 1];

      if (tier.minStake <= previous.minStake) {
        errors.push({
          path: `staking.tiers[${index}].minStake`,
          message: 'Tier thresholds must be strictly increasing',
          value: tier.minStake.toString()
        });
      }
      if (STAKE_TIER_ORDER.indexOf(tier.tier) <= STAKE_TIER_ORDER.indexOf(previous.tier)) {
        errors.push({ path: `staking.tiers[${index}].tier`, message: 'Tiers must follow none < bronze < silver < gold < platinum', value: tier.tier });
      }
      if (tier.priorityWeight < previous.priorityWeight || tier.feeDiscountBps < previous.feeDiscountBps) {
        errors.push({
          path: `staking.tiers[${index}]`,
          message: 'Priority weight and fee discount must not decrease with tier',
          value: tier.tier
        });
      }
    });

    return errors;
  }

  private validateMatchingConfig(config: MatchingConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isInteger(config.admissionWindowMs) || config.admissionWindowMs < 0) {
      errors.push({ path: 'matching.admissionWindowMs', message: 'Admission window must be a non-negative integer', value: config.admissionWindowMs });
    }

    if (!Number.isInteger(config.maxVersionRetries) || config.maxVersionRetries < 0) {
      errors.push({ path: 'matching.maxVersionRetries', message: 'Max version retries must be non-negative', value: config.maxVersionRetries });
    }

    return errors;
  }

  private validateOrderConfig(config: OrderConfig): ConfigValidationError[] {
    const errors: ConfigValidationError[] = [];

    if (!Number.isInteger(config.maxMultisigThreshold) || config.maxMultisigThreshold < 1 || config.maxMultisigThreshold > 255) {
      errors.push({ path: 'orders.maxMultisigThreshold', message: 'Max multisig threshold must be between 1 and 255', value: config.maxMultisigThreshold });
    }

    if (!Number.isInteger(config.commitmentTtlMs) || config.commitmentTtlMs < 1000) {
      errors.push({ path: 'orders.commitmentTtlMs', message: 'Commitment TTL must be at least 1000ms', value: config.commitmentTtlMs });
    }

    return errors;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function pickStrings<K extends string>(source: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, string>> {
  const picked: Partial<Record<K, string>> = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'string') picked[key] = value;
  }
  return picked;
}

function pickNumbers<K extends string>(source: Record<string, unknown>, keys: readonly K[]): Partial<Record<K, number>> {
  const picked: Partial<Record<K, number>> = {};
  for (const key of keys) {
    const value = source[key];
    if (typeof value === 'number') picked[key] = value;
  }
  return picked;
}

function parseTier(entry: unknown, index: number): TierDefinition {
  if (!isRecord(entry)) {
    throw new Error(`staking.tiers[${index}] must be an object`);
  }

  const tier = STAKE_TIER_ORDER.find(candidate => candidate === entry.tier);
  const minStake = entry.minStake;
  if (!tier || (typeof minStake !== 'string' && typeof minStake !== 'number')) {
    throw new Error(`staking.tiers[${index}] needs a known tier name and a minStake`);
  }
  if (typeof entry.priorityWeight !== 'number' || typeof entry.feeDiscountBps !== 'number') {
    throw new Error(`staking.tiers[${index}] needs numeric priorityWeight and feeDiscountBps`);
  }

  return {
    tier,
    minStake: BigInt(minStake),
    priorityWeight: entry.priorityWeight,
    feeDiscountBps: entry.feeDiscountBps
  };
}
