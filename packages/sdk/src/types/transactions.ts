/**
 * Zod schemas for Knox transaction records.
 *
 * A transaction is written with `PUT /v1/transactions` as
 * `TransactionDataWithLineItems` and read back as `Transaction`, which adds
 * the reference id and version bookkeeping Knox assigns.
 */

import { z } from 'zod';

// ============================================================================
// Enumerations
// ============================================================================

export const TRANSACTION_TYPES = ['Order', 'Refund'] as const;

export const SALES_CHANNEL_TYPES = ['Marketplace', 'Webshop'] as const;

export const INTEGRATION_TYPES = [
  'xero',
  'magento',
  'etsy',
  'shopify',
  'bigcommerce',
  'woocommerce',
  'stripe',
  'amazon_seller_central',
  'wix',
  'ebay',
  'quickbooks',
  'walmart',
] as const;

export const transactionTypeSchema = z.enum(TRANSACTION_TYPES);
export const salesChannelTypeSchema = z.enum(SALES_CHANNEL_TYPES);
export const integrationTypeSchema = z.enum(INTEGRATION_TYPES);

export type TransactionType = z.infer<typeof transactionTypeSchema>;
export type SalesChannelType = z.infer<typeof salesChannelTypeSchema>;
export type IntegrationType = z.infer<typeof integrationTypeSchema>;

// ============================================================================
// Shared Schemas
// ============================================================================

/** Crockford base32, 26 characters */
const ulidSchema = z.string().regex(/^[0-9A-HJKMNP-TV-Z]{26}$/, 'Invalid ULID');

// Timestamps stay as the ISO strings Knox sends
const timestampSchema = z.string();

export const addressSchema = z.object({
  street: z.string().nullable(),
  city: z.string().nullable(),
  postal_code: z.string().nullable(),
  state: z.string().nullable(),
  country: z.string().nullable(),
});

export const versionMetadataSchema = z.object({
  /** The version of this transaction */
  version: z.number().int(),
  /** The current live version (not necessarily the latest) */
  live_version: z.number().int(),
  latest_version: z.number().int(),
});

// ============================================================================
// Line Items
// ============================================================================

export const transactionLineItemMetadataSchema = z.object({
  standard_template_records_id: z.number().int(),
  line_id: z.string().nullable().optional(),
  // Deprecated: no longer set in records sent from the tax engine
  transaction_number: z.string().nullable().optional(),
});

export const transactionLineItemSchema = z.object({
  sku: z.string().nullable().optional(),
  item_description: z.string().nullable().optional(),
  item_quantity: z.number().int().nullable().optional(),
  item_price: z.number().nullable().optional(),
  item_discount: z.number().nullable().optional(),
  line_item_metadata: transactionLineItemMetadataSchema,
});

// ============================================================================
// Transaction
// ============================================================================

export const standardTemplateRecordVersionDataSchema = z.object({
  id: z.number().int(),
  meta_updated_at: timestampSchema.nullable(),
});

export const transactionMetadataSchema = z.object({
  standard_template_records_id: z.number().int(),
  meta_sale_platform: z.string().nullable().optional(),
  data_source: z.string().nullable().optional(),
  data_source_url: z.string().nullable().optional(),
  organization_id: z.string().uuid(),
  batch_id: z.string().nullable().optional(),
  batch_date: timestampSchema.nullable().optional(),
  customer_id: z.string().nullable().optional(),
  order_number: z.string(),
  meta_integration_id: z.string().nullable(),
  meta_integration_type: integrationTypeSchema.nullable(),
  edited_by: z.string().nullable(),
  deletion_job_id: z.string().nullable(),
  deleted_at: timestampSchema.nullable(),
  transaction_standard_template_record_versions: z
    .array(standardTemplateRecordVersionDataSchema)
    .nullable()
    .optional(),
  transaction_number: z.string().nullable().optional(),
  refund_id: z.string().nullable().optional(),
});

export const transactionDataSchema = z.object({
  model_version: z.literal(1).default(1),
  record_id: z.string(),
  version: z.number().int().nullable().optional(),
  transaction_id: z.string(),
  transaction_type: transactionTypeSchema,
  sales_channel_type: salesChannelTypeSchema.nullable().optional(),
  transaction_date: timestampSchema,
  exemption_type: z.string().nullable().optional(),
  currency: z.string().nullable().optional(),
  net_receipt_pre_tax: z.number().nullable().optional(),
  shipping_receipt_pre_tax: z.number().nullable().optional(),
  tax_charged: z.number().nullable().optional(),
  shipping_to_address: addressSchema.nullable().optional(),
  shipping_from_address: addressSchema.nullable().optional(),
  billing_address: addressSchema.nullable().optional(),
  excluded: z.boolean(),
  transaction_metadata: transactionMetadataSchema,
});

export const transactionDataWithLineItemsSchema = transactionDataSchema.extend({
  line_items: z.array(transactionLineItemSchema).default([]),
});

export const transactionSchema = transactionDataWithLineItemsSchema.extend({
  reference_id: ulidSchema,
  version_metadata: versionMetadataSchema,
});

export type Address = z.infer<typeof addressSchema>;
export type VersionMetadata = z.infer<typeof versionMetadataSchema>;
export type TransactionLineItemMetadata = z.infer<typeof transactionLineItemMetadataSchema>;
export type TransactionLineItem = z.infer<typeof transactionLineItemSchema>;
export type StandardTemplateRecordVersionData = z.infer<
  typeof standardTemplateRecordVersionDataSchema
>;
export type TransactionMetadata = z.infer<typeof transactionMetadataSchema>;
export type TransactionData = z.infer<typeof transactionDataSchema>;
export type TransactionDataWithLineItems = z.infer<typeof transactionDataWithLineItemsSchema>;
export type Transaction = z.infer<typeof transactionSchema>;

/** Request shape for an upsert; defaulted fields may be omitted */
export type PutTransactionRequest = z.input<typeof transactionDataWithLineItemsSchema>;
