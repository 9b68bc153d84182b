import { z } from 'zod';

/**
 * GET /iserver/auth/status
 */
export const AuthStatusSchema = z.object({
  authenticated: z.boolean(),
  connected: z.boolean(),
  competing: z.boolean().optional(),
  message: z.string().optional(),
});
export type AuthStatus = z.infer<typeof AuthStatusSchema>;

const ContractSectionSchema = z.object({
  secType: z.string(),
  exchange: z.string().optional(),
});

/**
 * One match of GET /iserver/secdef/search. The gateway returns conids as numbers
 * for most contracts and as strings for some indices.
 */
export const ContractMatchSchema = z.object({
  conid: z.union([z.number(), z.string()]).transform((value) => String(value)),
  symbol: z.string().optional(),
  companyName: z.string().nullish(),
  description: z.string().nullish(),
  sections: z.array(ContractSectionSchema).optional(),
});
export type ContractMatch = z.infer<typeof ContractMatchSchema>;

export const ContractSearchResponseSchema = z.array(ContractMatchSchema);

/**
 * One bar of GET /iserver/marketdata/history. `t` is epoch milliseconds.
 */
export const HistoryBarSchema = z.object({
  t: z.number(),
  o: z.number(),
  h: z.number(),
  l: z.number(),
  c: z.number(),
  v: z.number().optional(),
});
export type HistoryBar = z.infer<typeof HistoryBarSchema>;

export const HistoryResponseSchema = z.object({
  symbol: z.string().optional(),
  text: z.string().optional(),
  data: z.array(HistoryBarSchema).default([]),
});
export type HistoryResponse = z.infer<typeof HistoryResponseSchema>;
