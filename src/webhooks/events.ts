/**
 * Webhook event decoding
 *
 * Reduces GitHub's per-event JSON payloads to a closed union of the four
 * changes that can invalidate sessions. Decoding happens once, at the
 * boundary; everything downstream works on `WebhookEvent`.
 *
 * Payload fields read per event type:
 * - github_app_authorization: action, sender.login
 * - organization:             action, membership.user.login, organization.login
 * - membership:               action, scope, member.login, team.name, organization.login
 * - team:                     action, team.name, organization.login, changes.name.from
 */

import { z } from 'zod';

export const EVENT_HEADER = 'x-github-event';

// ============================================================================
// Normalized events
// ============================================================================

export type WebhookEvent =
  | { type: 'app-authorization-revoked'; username: string }
  | { type: 'org-member-removed'; username: string; org: string }
  | {
      type: 'team-membership-changed';
      action: 'added' | 'removed';
      username: string;
      org: string;
      team: string;
    }
  | { type: 'team-renamed-or-deleted'; org: string; oldTeamName: string };

export type DecodeResult =
  | { kind: 'event'; event: WebhookEvent }
  | { kind: 'ignored'; reason: string }
  | { kind: 'malformed'; reason: string };

// ============================================================================
// Payload schemas
// ============================================================================

const Login = z.object({ login: z.string().min(1) });
const Named = z.object({ name: z.string().min(1) });
const WithAction = z.object({ action: z.string() });

const AppAuthorizationPayload = z.object({ sender: Login });

const OrganizationPayload = z.object({
  membership: z.object({ user: Login }),
  organization: Login,
});

const MembershipScope = z.object({ scope: z.string() });

const MembershipPayload = z.object({
  member: Login,
  team: Named,
  organization: Login,
});

const TeamPayload = z.object({
  team: Named,
  organization: Login,
  changes: z
    .object({
      name: z.object({ from: z.string() }).optional(),
    })
    .optional(),
});

// ============================================================================
// Decoding
// ============================================================================

type Decoder = (payload: unknown, action: string) => DecodeResult;

function malformed(eventType: string, error: z.ZodError): DecodeResult {
  const issue = error.issues[0];
  const where = issue?.path.length ? issue.path.join('.') : 'payload';
  return { kind: 'malformed', reason: `${eventType}: ${where}: ${issue?.message ?? 'invalid'}` };
}

const decoders: Record<string, Decoder> = {
  github_app_authorization: (payload, action) => {
    if (action !== 'revoked') {
      return { kind: 'ignored', reason: `github_app_authorization action ${action}` };
    }
    const parsed = AppAuthorizationPayload.safeParse(payload);
    if (!parsed.success) {
      return malformed('github_app_authorization', parsed.error);
    }
    return { kind: 'event', event: { type: 'app-authorization-revoked', username: parsed.data.sender.login } };
  },

  organization: (payload, action) => {
    if (action !== 'member_removed') {
      return { kind: 'ignored', reason: `organization action ${action}` };
    }
    const parsed = OrganizationPayload.safeParse(payload);
    if (!parsed.success) {
      return malformed('organization', parsed.error);
    }
    return {
      kind: 'event',
      event: {
        type: 'org-member-removed',
        username: parsed.data.membership.user.login,
        org: parsed.data.organization.login,
      },
    };
  },

  membership: (payload, action) => {
    const scope = MembershipScope.safeParse(payload);
    if (!scope.success) {
      return malformed('membership', scope.error);
    }
    if (scope.data.scope !== 'team') {
      return { kind: 'ignored', reason: `membership scope ${scope.data.scope}` };
    }
    if (action !== 'added' && action !== 'removed') {
      return { kind: 'ignored', reason: `membership action ${action}` };
    }
    const parsed = MembershipPayload.safeParse(payload);
    if (!parsed.success) {
      return malformed('membership', parsed.error);
    }
    return {
      kind: 'event',
      event: {
        type: 'team-membership-changed',
        action,
        username: parsed.data.member.login,
        org: parsed.data.organization.login,
        team: parsed.data.team.name,
      },
    };
  },

  team: (payload, action) => {
    if (action !== 'deleted' && action !== 'edited') {
      return { kind: 'ignored', reason: `team action ${action}` };
    }
    const parsed = TeamPayload.safeParse(payload);
    if (!parsed.success) {
      return malformed('team', parsed.error);
    }

    const org = parsed.data.organization.login;
    if (action === 'deleted') {
      return { kind: 'event', event: { type: 'team-renamed-or-deleted', org, oldTeamName: parsed.data.team.name } };
    }

    // Edits that do not rename the team keep every binding valid
    const oldName = parsed.data.changes?.name?.from;
    if (!oldName) {
      return { kind: 'ignored', reason: 'team edit without a rename' };
    }
    return { kind: 'event', event: { type: 'team-renamed-or-deleted', org, oldTeamName: oldName } };
  },
};

/**
 * Whether deliveries of `eventType` can carry an invalidation
 */
export function isHandledEventType(eventType: string): boolean {
  return Object.prototype.hasOwnProperty.call(decoders, eventType);
}

/**
 * Decode one delivery.
 *
 * @param eventType - Value of the X-GitHub-Event header
 * @param rawBody - Raw request body (already signature-checked)
 */
export function decodeWebhookEvent(eventType: string, rawBody: string): DecodeResult {
  if (!isHandledEventType(eventType)) {
    return { kind: 'ignored', reason: `event type ${eventType || '(none)'}` };
  }

  let payload: unknown;
  try {
    payload = JSON.parse(rawBody);
  } catch (error) {
    return {
      kind: 'malformed',
      reason: `${eventType}: ${error instanceof Error ? error.message : 'invalid JSON'}`,
    };
  }

  const action = WithAction.safeParse(payload);
  if (!action.success) {
    return malformed(eventType, action.error);
  }

  return decoders[eventType](payload, action.data.action);
}
