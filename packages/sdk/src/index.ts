/**
 * Knox SDK - Typed client for the Knox transaction service
 */

export { createKnoxClient, KnoxClient, type KnoxClientConfig } from './client';
export { KnoxClientError } from './errors';
export { checkHealth } from './health';

export {
  eq,
  searchRecordSchema,
  searchTransactionsResponseSchema,
  type SearchFilter,
  type SearchOperator,
  type SearchRecord,
  type SearchTransactionsRequest,
  type SearchTransactionsResponse,
} from './types/search';

export {
  addressSchema,
  INTEGRATION_TYPES,
  integrationTypeSchema,
  SALES_CHANNEL_TYPES,
  salesChannelTypeSchema,
  standardTemplateRecordVersionDataSchema,
  TRANSACTION_TYPES,
  transactionDataSchema,
  transactionDataWithLineItemsSchema,
  transactionLineItemMetadataSchema,
  transactionLineItemSchema,
  transactionMetadataSchema,
  transactionSchema,
  transactionTypeSchema,
  versionMetadataSchema,
  type Address,
  type IntegrationType,
  type PutTransactionRequest,
  type SalesChannelType,
  type StandardTemplateRecordVersionData,
  type Transaction,
  type TransactionData,
  type TransactionDataWithLineItems,
  type TransactionLineItem,
  type TransactionLineItemMetadata,
  type TransactionMetadata,
  type TransactionType,
  type VersionMetadata,
} from './types/transactions';
