/**
 * Zod schemas for the Telegram Bot API responses we consume
 */

import { z } from "zod";

export const TelegramEnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({
    id: z.number(),
    type: z.string().optional(),
  }),
  from: z
    .object({
      id: z.number(),
      username: z.string().optional(),
      first_name: z.string().optional(),
    })
    .optional(),
  text: z.string().optional(),
});

export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;

export const TelegramUpdateSchema = z.object({
  update_id: z.number(),
  message: TelegramMessageSchema.optional(),
});

export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

export const TelegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean(),
  username: z.string().optional(),
});

export type TelegramUser = z.infer<typeof TelegramUserSchema>;
