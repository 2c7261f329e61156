/**
 * OTC Limit Engine - Main Entry Point
 * Limit orders over collateral with stake-tier priority, commit-reveal
 * orders, multisig approval and a governed fee treasury
 */

export * from './models';

export * from './services/OtcEngine';
export * from './services/OrderStore';
export * from './services/CommitRevealVault';
export * from './services/MultisigGate';
export * from './services/StakingRegistry';
export * from './services/MatchingEngine';
export * from './services/TreasuryService';
export * from './services/AuditService';

export * from './connectors/CollateralLedger';
export * from './connectors/InMemoryTokenLedger';
export * from './connectors/AccessControl';
export * from './connectors/HashProvider';
export * from './connectors/TimeSource';

export * from './config/ConfigurationManager';
export * from './security/InputValidator';
export * from './utils/ErrorHandler';
export * from './utils/feeMath';
export * from './utils/KeyedMutex';

export const APP_VERSION = '1.0.0';
export const APP_NAME = 'OTC Limit Engine';
