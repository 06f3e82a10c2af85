export { AllowanceBook } from './allowance-book.js';
export { InMemoryBalanceStore, type BalanceStore } from './balance-store.js';
export { Ledger, type LedgerReader, type LedgerWriter } from './ledger.js';
export { PolicyStore, type PolicySettings, type PolicyStoreOptions } from './policy/policy-store.js';
export { NO_EXEMPTIONS, type AccountFlags, type PolicyProvider, type PolicySnapshot } from './policy/policy-types.js';
export { computeTax, untaxed, type TaxSplit } from './tax-policy.js';
export { Token, type TokenOptions } from './token.js';
export {
  TransferOrchestrator,
  type TransferKind,
  type TransferReceipt,
  type TransferRequest,
  type TransferStage,
} from './transfer-orchestrator.js';
export {
  checkPreconditions,
  checkTradingGate,
  checkTransactionCeiling,
  checkWalletCeiling,
} from './transfer-guard.js';
