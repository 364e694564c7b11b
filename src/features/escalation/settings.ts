/**
 * Threadkeeper — src/features/escalation/settings.ts
 * WHAT: zod schema for escalation settings writes.
 * WHY: tier2 > tier1 must hold before a row exists; the table CHECK is the backstop.
 */
// SPDX-License-Identifier: LicenseRef-ANW-1.0

import { z } from "zod";
import { ESCALATION_BEHAVIORS } from "./types.js";

const snowflake = z.string().regex(/^\d{17,20}$/, "must be a Discord snowflake");

export const escalationSettingsSchema = z
  .object({
    guildId: snowflake,
    tier1ThresholdHours: z.number().int().positive(),
    tier1RoleId: snowflake,
    tier2ThresholdHours: z.number().int().positive(),
    tier2RoleId: snowflake,
    escalationChannelId: snowflake,
    enabled: z.boolean().default(true),
    behavior: z.enum(ESCALATION_BEHAVIORS).default("support_only"),
    communityDelayHours: z.number().int().nonnegative().default(12),
  })
  .refine((s) => s.tier2ThresholdHours > s.tier1ThresholdHours, {
    message: "tier 2 threshold must be greater than tier 1 threshold",
    path: ["tier2ThresholdHours"],
  });

export type EscalationSettingsInput = z.input<typeof escalationSettingsSchema>;
