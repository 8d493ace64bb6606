/**
 * Audit ledger barrel.
 *
 * @module ledger
 */

export * from './types.js';
export * from './hashChain.js';
export * from './ledgerStore.js';
export * from './memoryLedgerStore.js';
export * from './pgLedgerStore.js';
export * from './ledgerExport.js';
export * from './auditLedger.js';
export * from './decisionRecorder.js';
