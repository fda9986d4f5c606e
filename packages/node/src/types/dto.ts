/**
 * Request DTOs with Zod validation schemas.
 *
 * Each DTO has a Zod schema and a derived TypeScript type. Amounts are
 * decimal strings in whole tokens; times are Unix seconds.
 */

import { z } from "zod";
import { BASIS_POINTS_DENOMINATOR, isAddress, POOL_LABELS } from "@allotment/types";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AddressSchema = z
  .string()
  .refine(isAddress, { message: "Expected a 0x-prefixed 20-byte hex address" });

export const AmountSchema = z
  .string()
  .regex(/^\d+(\.\d+)?$/, "Expected a non-negative decimal amount");

export const TimestampSchema = z.number().int().min(0);

export const PoolLabelSchema = z.enum(POOL_LABELS);

export const PaginationQuerySchema = z.object({
  cursor: z.string().optional(),
  limit: z.coerce.number().int().min(1).max(100).default(20),
});

/** Path parameter holding a plan id: decimal digits only. */
export const PlanIdParamSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative integer id")
  .transform(Number)
  .pipe(z.number().int().safe());

// =============================================================================
// Vesting DTOs
// =============================================================================

export const CreatePlanSchema = z.object({
  startDate: TimestampSchema,
  cliffDuration: TimestampSchema,
  totalDuration: TimestampSchema,
  revocable: z.boolean(),
  initialReleasePercentage: z.number().int().min(0).max(BASIS_POINTS_DENOMINATOR),
  poolLabel: PoolLabelSchema,
});

export type CreatePlanDto = z.infer<typeof CreatePlanSchema>;

export const SetTriggerTimeSchema = z.object({
  triggerTime: TimestampSchema,
});

export type SetTriggerTimeDto = z.infer<typeof SetTriggerTimeSchema>;

export const IssueGrantSchema = z.object({
  beneficiary: AddressSchema,
  planId: z.number().int().min(0),
  amount: AmountSchema,
  startDate: TimestampSchema,
});

export type IssueGrantDto = z.infer<typeof IssueGrantSchema>;

export const RevokeSchema = z.object({
  beneficiary: AddressSchema,
});

export type RevokeDto = z.infer<typeof RevokeSchema>;

export const WriteOffDebtSchema = z.object({
  beneficiary: AddressSchema,
  amount: AmountSchema,
});

export type WriteOffDebtDto = z.infer<typeof WriteOffDebtSchema>;

// =============================================================================
// Distribution DTOs
// =============================================================================

export const SwapSchema = z.object({
  to: AddressSchema,
  amount: AmountSchema,
});

export type SwapDto = z.infer<typeof SwapSchema>;

export const LiquiditySchema = z.object({
  amount: AmountSchema,
});

export type LiquidityDto = z.infer<typeof LiquiditySchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = PaginationQuerySchema.extend({
  afterPosition: z.coerce.number().int().min(0).optional(),
  type: z.string().min(1).optional(),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
