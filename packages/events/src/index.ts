export { EventBus, type EventBusOptions } from './event-bus.js';
export type {
  AccountFlagsUpdatedEvent,
  ApprovalEvent,
  LedgerEvent,
  OwnershipTransferredEvent,
  PolicyField,
  PolicyUpdatedEvent,
  TransferCommittedEvent,
} from './ledger-events.js';
