/**
 * Webhook Dispatcher - Event-Driven Session Invalidation
 *
 * Turns a verified GitHub webhook delivery into removals on the session
 * index, then destroys every removed session in the session store.
 *
 * Routing:
 * - app authorization revoked      → removeAllForUser
 * - organization member removed    → removeForUserInOrg
 * - team membership added (rw)     → removeAllForUser (re-login picks up the new tier)
 * - team membership removed        → removeForUserInOrgTeam
 * - team deleted / renamed         → removeForOrgTeam on the old name
 */

import { AuditService } from '../core/audit-service.js';
import type { SessionIndex } from '../core/session-index.js';
import type { TeamMatcher } from '../core/team-matcher.js';
import type { SessionStore } from '../sessions/types.js';
import { GateErrors } from '../utils/errors.js';
import { decodeWebhookEvent } from './events.js';
import type { WebhookEvent } from './events.js';
import { verifySignature } from './signature.js';
import type { SignatureHeaders } from './signature.js';

export interface WebhookDelivery {
  /** Value of X-GitHub-Event */
  eventType?: string;
  signatures: SignatureHeaders;
  rawBody: Buffer;
}

export type WebhookOutcome =
  | { status: 'dropped'; reason: string; sessionIds: [] }
  | { status: 'ignored'; reason: string; sessionIds: [] }
  | { status: 'processed'; event: WebhookEvent; sessionIds: string[] };

export interface WebhookDispatcherOptions {
  webhookSecret: string;
  index: SessionIndex;
  matcher: TeamMatcher;
  store: SessionStore;
  auditService?: AuditService;
}

const AUDIT_SOURCE = 'auth:webhook';

export class WebhookDispatcher {
  private readonly auditService: AuditService;

  constructor(private readonly options: WebhookDispatcherOptions) {
    this.auditService = options.auditService ?? new AuditService();
  }

  /**
   * Handle one delivery.
   *
   * @throws GateError MALFORMED_INPUT for an unparsable payload (index untouched)
   * @throws GateError INTERNAL_FAILURE when the store fails to destroy a session
   */
  async dispatch(delivery: WebhookDelivery): Promise<WebhookOutcome> {
    const check = verifySignature(delivery.rawBody, delivery.signatures, this.options.webhookSecret);
    if (!check.valid) {
      console.warn(`[WebhookDispatcher] dropping delivery: signature ${check.reason}`);
      const outcome: WebhookOutcome = { status: 'dropped', reason: `signature ${check.reason}`, sessionIds: [] };
      await this.audit(outcome);
      return outcome;
    }

    const decoded = decodeWebhookEvent(delivery.eventType ?? '', delivery.rawBody.toString('utf-8'));
    if (decoded.kind === 'malformed') {
      console.warn(`[WebhookDispatcher] malformed payload: ${decoded.reason}`);
      throw GateErrors.MALFORMED_INPUT('webhook payload', { reason: decoded.reason });
    }
    if (decoded.kind === 'ignored') {
      console.debug(`[WebhookDispatcher] ignoring ${decoded.reason}`);
      return { status: 'ignored', reason: decoded.reason, sessionIds: [] };
    }

    const sessionIds = this.invalidate(decoded.event);
    await this.destroy(sessionIds);

    const outcome: WebhookOutcome = { status: 'processed', event: decoded.event, sessionIds };
    await this.audit(outcome);
    return outcome;
  }

  /**
   * Apply an event to the session index.
   *
   * @returns ids of the sessions removed from the index
   */
  invalidate(event: WebhookEvent): string[] {
    const { index, matcher } = this.options;

    switch (event.type) {
      case 'app-authorization-revoked':
        return index.removeAllForUser(event.username);

      case 'org-member-removed':
        return index.removeForUserInOrg(event.username, event.org);

      case 'team-membership-changed':
        if (event.action === 'removed') {
          return index.removeForUserInOrgTeam(event.username, event.org, event.team);
        }
        // Joining a read-only team never changes an existing tier
        if (!matcher.isReadWriteTeam(event.org, event.team)) {
          return [];
        }
        return index.removeAllForUser(event.username);

      case 'team-renamed-or-deleted':
        return index.removeForOrgTeam(event.org, event.oldTeamName);
    }
  }

  private async destroy(sessionIds: string[]): Promise<void> {
    const failed: string[] = [];
    for (const sessionId of sessionIds) {
      try {
        await this.options.store.markOrDestroySessionById(sessionId);
      } catch (error) {
        console.error(
          `[WebhookDispatcher] failed to destroy session ${sessionId}:`,
          error instanceof Error ? error.message : String(error)
        );
        failed.push(sessionId);
      }
    }

    if (failed.length > 0) {
      throw GateErrors.INTERNAL_FAILURE('session store rejected destroy', { sessionIds: failed });
    }
  }

  private async audit(outcome: WebhookOutcome): Promise<void> {
    try {
      await this.auditService.log({
        timestamp: new Date(),
        source: AUDIT_SOURCE,
        userId: outcome.status === 'processed' && 'username' in outcome.event ? outcome.event.username : undefined,
        action: outcome.status === 'processed' ? outcome.event.type : 'webhook',
        success: outcome.status === 'processed',
        reason: outcome.status === 'processed' ? undefined : outcome.reason,
        metadata: { status: outcome.status, sessionIds: outcome.sessionIds },
      });
    } catch (error) {
      console.error(
        '[WebhookDispatcher] failed to write audit entry:',
        error instanceof Error ? error.message : String(error)
      );
    }
  }
}
