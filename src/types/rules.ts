import { z } from 'zod';
import { parseIsoDate } from '../utils/dates.js';

const isoDate = z.string().refine((value) => parseIsoDate(value) !== null, 'expected YYYY-MM-DD');

/**
 * Gift entries may be plain names or objects carrying a name
 */
export const giftSchema = z.union([
  z.string(),
  z.object({ name: z.string() }).passthrough(),
]);

export type Gift = z.infer<typeof giftSchema>;

export const ruleActionSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('override_box'), box: z.string().min(1) }),
  z.object({ type: z.literal('add_gifts'), gifts: z.array(giftSchema).default([]) }),
]);

export type RuleAction = z.infer<typeof ruleActionSchema>;

const ruleBase = {
  id: z.string().optional(),
  description: z.string().optional(),
  enabled: z.boolean().default(true),
  applicability_labels: z.array(z.string()).default([]),
  action: ruleActionSchema,
};

export const couponRuleSchema = z.object({
  ...ruleBase,
  applies_to: z.literal('coupon'),
  coupon: z.object({ code: z.string().min(1) }),
});

export const offerRuleSchema = z.object({
  ...ruleBase,
  applies_to: z.literal('offer'),
  offer: z.object({ id: z.union([z.string(), z.number()]).transform((value) => String(value).trim()) }),
  valid_from: isoDate.optional(),
  valid_until: isoDate.optional(),
});

export const ruleSchema = z.discriminatedUnion('applies_to', [couponRuleSchema, offerRuleSchema]);

export type Rule = z.infer<typeof ruleSchema>;
export type CouponRule = z.infer<typeof couponRuleSchema>;
export type OfferRule = z.infer<typeof offerRuleSchema>;

export const rulesFileSchema = z.object({
  rules: z.array(ruleSchema).default([]),
});
