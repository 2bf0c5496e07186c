import { z } from 'zod';

const heightSchema = z.number().int().nonnegative();
const amountSchema = z.number().nonnegative();

// ============================================================================
// get_info
// ============================================================================

export const getInfoResponseSchema = z.object({
  height: heightSchema,
  target_height: heightSchema.default(0),
  block_weight_limit: amountSchema.default(0),
  block_size_limit: amountSchema.default(0),
});

// ============================================================================
// get_version
// ============================================================================

export const getVersionResponseSchema = z.object({
  version: z.number().int().nonnegative(),
});

// ============================================================================
// hard_fork_info
// ============================================================================

export const earliestHeightResponseSchema = z.object({
  earliest_height: heightSchema,
});

export const hardForkVersionResponseSchema = z.object({
  version: z.number().int().min(0).max(255),
});

// ============================================================================
// get_fee_estimate
// ============================================================================

export const feeEstimateResponseSchema = z.object({
  fee: amountSchema,
  quantization_mask: amountSchema.default(0),
});

// ============================================================================
// get_service_nodes / get_all_service_nodes
// ============================================================================

const serviceNodeEntrySchema = z.object({
  service_node_pubkey: z.string().min(1),
  registration_height: heightSchema,
  requested_unlock_height: heightSchema.default(0),
  last_reward_block_height: heightSchema.default(0),
  last_uptime_proof: z.number().int().nonnegative().default(0),
  active: z.boolean().default(false),
  funded: z.boolean().default(false),
  staking_requirement: amountSchema.default(0),
  total_contributed: amountSchema.default(0),
  operator_address: z.string().default(''),
});

export const serviceNodesResponseSchema = z.object({
  service_node_states: z.array(serviceNodeEntrySchema).default([]),
});

export type GetInfoResponse = z.output<typeof getInfoResponseSchema>;
export type FeeEstimateResponse = z.output<typeof feeEstimateResponseSchema>;
export type ServiceNodesResponse = z.output<typeof serviceNodesResponseSchema>;
