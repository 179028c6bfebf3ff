/**
 * Zod schemas for the persisted recipient registry
 */

import { z } from "zod";

export const RecipientSchema = z.object({
  id: z.number().int(),
  displayName: z.string().nullable().default(null),
  subscribed: z.boolean().default(false),
});

export type Recipient = z.infer<typeof RecipientSchema>;

/**
 * Earlier releases stored `{ admins: [{ chat_id, username, receive }] }` at
 * the same path. Such files are read as-is and rewritten in the current
 * shape on the next mutation.
 */
const LegacyAdminSchema = z.object({
  chat_id: z.number().int(),
  username: z.string().nullable().optional(),
  receive: z.boolean().optional(),
});

const LegacyRegistrySchema = z
  .object({
    admins: z.array(LegacyAdminSchema),
  })
  .transform((doc) => ({
    recipients: doc.admins.map(
      (admin): Recipient => ({
        id: admin.chat_id,
        displayName: admin.username ?? null,
        subscribed: admin.receive ?? false,
      }),
    ),
  }));

const CurrentRegistrySchema = z.object({
  recipients: z.array(RecipientSchema),
});

/**
 * Document stored at <DATA_DIR>/admins.json
 */
export const RegistrySnapshotSchema = z.union([
  CurrentRegistrySchema,
  LegacyRegistrySchema,
]);

export type RegistrySnapshot = z.infer<typeof CurrentRegistrySchema>;
