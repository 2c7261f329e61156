/**
 * Tests for Configuration Manager
 */

import { describe, it, expect, beforeEach } from 'vitest';
import * as fc from 'fast-check';
import { join } from 'path';
import { ConfigurationManager, DEFAULT_TIERS, getDefaultConfiguration } from './ConfigurationManager';

const FIXTURES = join(__dirname, 'fixtures');

describe('ConfigurationManager', () => {
  let configManager: ConfigurationManager;

  beforeEach(() => {
    configManager = new ConfigurationManager(undefined, {});
  });

  describe('Configuration Loading and Validation', () => {
    it('should load default configuration successfully', async () => {
      const config = await configManager.loadConfiguration();

      expect(config.environment).toBe('development');
      expect(config.fees).toEqual({ feeBps: 100, maxFeeBps: 1_000, makerRebateBps: 2_000 });
      expect(config.accounts.treasury).toBe('otc:treasury');
      expect(config.staking.tiers).toEqual(DEFAULT_TIERS);
    });

    it('should validate the default configuration', () => {
      const validation = configManager.validateConfiguration(getDefaultConfiguration());

      expect(validation.isValid).toBe(true);
      expect(validation.errors).toHaveLength(0);
    });

    it('should merge a JSON file under environment overrides', async () => {
      const manager = new ConfigurationManager(join(FIXTURES, 'engine.json'), { OTC_FEE_BPS: '40' });
      const config = await manager.loadConfiguration();

      expect(config.environment).toBe('staging');
      expect(config.logLevel).toBe('warn');
      expect(config.fees).toEqual({ feeBps: 40, maxFeeBps: 1_000, makerRebateBps: 1_000 });
      expect(config.matching).toEqual({ admissionWindowMs: 5, maxVersionRetries: 3 });
      expect(config.staking.tiers.map(tier => [tier.tier, tier.minStake])).toEqual([
        ['none', 0n],
        ['silver', 100n],
        ['platinum', 1_000_000n]
      ]);
    });

    it('should find the file through OTC_CONFIG_FILE', async () => {
      const manager = new ConfigurationManager(undefined, { OTC_CONFIG_FILE: join(FIXTURES, 'engine.json') });

      expect((await manager.loadConfiguration()).fees.feeBps).toBe(30);
    });

    it('should reject tier tables that are not increasing', async () => {
      const manager = new ConfigurationManager(join(FIXTURES, 'invalid-tiers.json'), {});

      await expect(manager.loadConfiguration()).rejects.toThrow('Tier thresholds must be strictly increasing');
      await expect(manager.loadConfiguration()).rejects.toThrow(
        'Priority weight and fee discount must not decrease with tier'
      );
    });

    it('should wrap load failures', async () => {
      const missing = new ConfigurationManager(join(FIXTURES, 'missing.json'), {});
      await expect(missing.loadConfiguration()).rejects.toThrow(/^Failed to load configuration: /);

      const tooExpensive = new ConfigurationManager(undefined, { OTC_FEE_BPS: '5000' });
      await expect(tooExpensive.loadConfiguration()).rejects.toThrow(
        'Failed to load configuration: Configuration validation failed: Fee must be an integer between 0 and the max fee'
      );
    });

    it('should read matching and order overrides from the environment', async () => {
      const manager = new ConfigurationManager(undefined, {
        NODE_ENV: 'production',
        LOG_LEVEL: 'error',
        OTC_ADMISSION_WINDOW_MS: '25',
        OTC_MAX_VERSION_RETRIES: '5',
        OTC_COMMITMENT_TTL_MS: '60000'
      });
      const config = await manager.loadConfiguration();

      expect(config.environment).toBe('production');
      expect(config.logLevel).toBe('error');
      expect(config.matching).toEqual({ admissionWindowMs: 25, maxVersionRetries: 5 });
      expect(config.orders).toEqual({ maxMultisigThreshold: 16, commitmentTtlMs: 60_000 });
    });
  });

  describe('Configuration Sections', () => {
    it('should return copies of sections', () => {
      const fees = configManager.getConfigSection('fees');
      fees.feeBps = 999;

      expect(configManager.getConfigSection('fees').feeBps).toBe(100);
    });

    it('should update configuration sections', () => {
      configManager.updateConfigSection('fees', { feeBps: 250 });

      expect(configManager.getConfigSection('fees')).toEqual({ feeBps: 250, maxFeeBps: 1_000, makerRebateBps: 2_000 });
    });

    it('should validate configuration after section updates', () => {
      expect(() => configManager.updateConfigSection('orders', { maxMultisigThreshold: 0 })).toThrow(
        'Configuration update failed validation: Max multisig threshold must be between 1 and 255'
      );
      expect(configManager.getConfigSection('orders').maxMultisigThreshold).toBe(16);
    });

    it('should reject tier weights and discounts that are not integers', () => {
      const withSilver = (changes: { priorityWeight?: number; feeDiscountBps?: number }) =>
        DEFAULT_TIERS.map(tier => (tier.tier === 'silver' ? { ...tier, ...changes } : { ...tier }));

      expect(() => configManager.updateConfigSection('staking', { tiers: withSilver({ feeDiscountBps: 2_500.5 }) })).toThrow(
        'Configuration update failed validation: Fee discount must be an integer between 0 and 10000 bps'
      );
      expect(() => configManager.updateConfigSection('staking', { tiers: withSilver({ priorityWeight: 1.5 }) })).toThrow(
        'Configuration update failed validation: Priority weight must be a non-negative integer'
      );
      expect(configManager.getConfigSection('staking').tiers[2]).toEqual({
        tier: 'silver',
        minStake: 1_000n,
        priorityWeight: 2,
        feeDiscountBps: 5_000
      });
    });

    it('should configure the fill reward', async () => {
      const manager = new ConfigurationManager(undefined, { OTC_FILL_REWARD_BPS: '100' });
      const config = await manager.loadConfiguration();

      expect(config.rewards).toEqual({ fillRewardBps: 100 });
      expect(config.accounts).toEqual({ treasury: 'otc:treasury', rewards: 'otc:rewards' });
      expect(() => configManager.updateConfigSection('rewards', { fillRewardBps: 10_001 })).toThrow(
        'Configuration update failed validation: Fill reward must be an integer between 0 and 10000 bps'
      );
      expect(() => configManager.updateConfigSection('accounts', { rewards: 'otc:treasury' })).toThrow(
        'Configuration update failed validation: Rewards account must differ from the treasury account'
      );
    });
  });

  describe('Validation paths', () => {
    it('should address each invalid field by path', () => {
      const config = getDefaultConfiguration();
      config.accounts.treasury = ' ';
      config.matching.admissionWindowMs = -1;
      config.orders.commitmentTtlMs = 10;
      config.staking.tiers = [{ tier: 'bronze', minStake: 1n, priorityWeight: 1, feeDiscountBps: 10_001 }];

      const paths = configManager.validateConfiguration(config).errors.map(error => error.path);
      expect(paths).toEqual([
        'accounts.treasury',
        'staking.tiers',
        'staking.tiers[0].feeDiscountBps',
        'matching.admissionWindowMs',
        'orders.commitmentTtlMs'
      ]);
    });

    /**
     * **Feature: otc-limit-engine, Property 7: Fee configuration bounds**
     */
    it('should accept fee settings exactly when they are within basis-point bounds', () => {
      fc.assert(fc.property(
        fc.integer({ min: 0, max: 12_000 }),
        fc.integer({ min: 0, max: 12_000 }),
        fc.integer({ min: 0, max: 12_000 }),
        (feeBps, maxFeeBps, makerRebateBps) => {
          const config = getDefaultConfiguration();
          config.fees = { feeBps, maxFeeBps, makerRebateBps };

          const expected = maxFeeBps <= 10_000 && feeBps <= maxFeeBps && makerRebateBps <= 10_000;
          expect(configManager.validateConfiguration(config).isValid).toBe(expected);
        }
      ), { numRuns: 100 });
    });
  });
});
