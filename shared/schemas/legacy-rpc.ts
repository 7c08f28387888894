import { z } from 'zod';

/**
 * Body of a legacy JSON-RPC request as sent by LMS-compatible control
 * surfaces, e.g.
 *
 * ```json
 * { "id": 1, "method": "slim.request", "params": ["kitchen", ["mixer", "volume", "40"]] }
 * ```
 *
 * Only `params` is interpreted. Words may arrive as numbers (`["mixer", "volume", 40]`),
 * so they are coerced to strings.
 */
export const LegacyRpcRequestSchema = z.object({
  id: z.union([z.string(), z.number()]).nullish(),
  method: z.string().optional(),
  params: z.tuple([
    z.string(),
    z.array(z.union([z.string(), z.number()]).transform((word) => String(word))),
  ]),
});
export type LegacyRpcRequest = z.infer<typeof LegacyRpcRequestSchema>;
