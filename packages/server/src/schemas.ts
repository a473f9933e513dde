// Asset Registry - Request Schemas

import { z } from 'zod';

const account = z.string().trim().min(1, 'account must not be empty').max(128);

export const mintRequestSchema = z.object({
  to: account,
  uri: z.string().max(2048).optional(),
});

export const approveRequestSchema = z.object({
  to: account,
});

export const transferRequestSchema = z.object({
  from: account,
  to: account,
});

export const operatorRequestSchema = z.object({
  operator: account,
  approved: z.boolean(),
});

export const wsClientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('subscribe'), account: account.optional() }),
  z.object({ type: z.literal('unsubscribe') }),
]);

export type MintRequest = z.infer<typeof mintRequestSchema>;
export type ApproveRequest = z.infer<typeof approveRequestSchema>;
export type TransferRequest = z.infer<typeof transferRequestSchema>;
export type OperatorRequest = z.infer<typeof operatorRequestSchema>;
export type WSClientMessage = z.infer<typeof wsClientMessageSchema>;
