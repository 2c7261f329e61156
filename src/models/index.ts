export * from './Order';
export * from './Commitment';
export * from './StakePosition';
export * from './MultisigApproval';
export * from './Treasury';
export * from './AuditEvent';
