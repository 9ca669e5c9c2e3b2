import { z } from 'zod';

// "org/team" grants the tier through team membership, a bare "org" through
// organization membership
const TeamRuleSchema = z
  .string()
  .min(1)
  .refine((rule) => rule.split('/').length <= 2 && !rule.startsWith('/') && !rule.endsWith('/'), {
    message: 'Team rule must be "org" or "org/team"',
  });

export const GitHubConfigSchema = z
  .object({
    // Empty string selects public github.com
    enterpriseUrl: z
      .union([z.literal(''), z.string().url({ message: 'Enterprise URL must be a valid URL' })])
      .default('')
      .transform((url) => url.replace(/\/+$/, '')),
    oauthClientId: z.string().min(1),
    oauthClientSecret: z.string().min(1),
    webhookSecret: z.string().min(1),
    readWriteTeams: z.array(TeamRuleSchema).default([]),
    readOnlyTeams: z.array(TeamRuleSchema).default([]),
    // Handed to the protected application for every authorized session
    defaultTeamId: z.string().min(1),
    callbackUrl: z.string().url().optional(),
  })
  .refine((github) => github.readWriteTeams.length + github.readOnlyTeams.length > 0, {
    message: 'At least one read-write or read-only team rule is required',
    path: ['readWriteTeams'],
  });

export const SessionConfigSchema = z.object({
  authKey: z.string().min(16),
  cryptKey: z.string().min(16),
  cookieName: z.string().min(1).default('githubauth'),
  maxAgeSeconds: z.number().int().min(60).max(2592000).default(86400),
  secureCookie: z.boolean().default(false),
});

export const ServerConfigSchema = z.object({
  port: z.number().int().min(1).max(65535).default(8000),
});

export const AuditConfigSchema = z.object({
  enabled: z.boolean().default(false),
  maxEntries: z.number().int().min(1).default(10000),
});

export const TeamGateConfigSchema = z.object({
  github: GitHubConfigSchema,
  sessions: SessionConfigSchema,
  server: ServerConfigSchema.default({}),
  audit: AuditConfigSchema.default({}),
});

export type GitHubConfig = z.infer<typeof GitHubConfigSchema>;
export type SessionConfig = z.infer<typeof SessionConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type TeamGateConfig = z.infer<typeof TeamGateConfigSchema>;
