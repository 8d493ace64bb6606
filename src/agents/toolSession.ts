/**
 * Agent Tool Session
 *
 * One conversational session with an agent. The session pins the policy
 * snapshot current at start, but nothing else: every tool call reads the
 * credential afresh from the provider and goes through the gateway
 * immediately before the tool runs, so a credential that expires or is
 * revoked mid-session is refused on the next call.
 *
 * Tool output is filtered by the call's scope filter, masked for the role,
 * and any natural-language text is screened for demographic content.
 *
 * @module agents/toolSession
 */

import { isAllowed, type AccessGateway } from '../access/gateway.js';
import { maskRecord } from '../access/fieldMask.js';
import { matchesScope, type ScopeFilter } from '../access/scopeFilter.js';
import type { PolicyProvider, ResourceResolver } from '../access/types.js';
import type { DualPathRouter } from '../isolation/index.js';
import { silentLogger, type Logger } from '../logging/logger.js';
import type { PolicySnapshot } from '../policy/types.js';
import type { Principal } from '../types/index.js';
import { publicMessage } from '../utils/responses.js';

// ─── Types ───────────────────────────────────────────────────────────────────

/** Returns the session's current signed credential. */
export type CredentialProvider = () => Promise<string>;

export interface ToolContext {
  principal: Principal;
  params: Record<string, unknown>;
  scopeFilter: ScopeFilter | null;
  requestId: string;
  deadline?: number;
}

export interface ToolOutput {
  records?: Array<Record<string, unknown>>;
  /** Natural-language output, screened before it is returned. */
  text?: string;
}

export interface ToolDefinition {
  run(context: ToolContext): Promise<ToolOutput>;
  /** Scope columns of one output record; when set, records outside the filter are dropped. */
  scopeRow?: (record: Record<string, unknown>) => Record<string, unknown>;
  /** Resolver for tools that address one record. */
  resolver?: (params: Record<string, unknown>) => ResourceResolver;
}

export type ToolCallResult =
  | {
      outcome: 'ALLOW';
      records: Array<Record<string, unknown>>;
      text: string | null;
      ledgerSequenceNo: number;
    }
  | { outcome: 'DENY'; message: string; ledgerSequenceNo: number };

export interface ToolSessionOptions {
  sessionId: string;
  gateway: AccessGateway;
  policy: PolicyProvider;
  router: DualPathRouter;
  credentials: CredentialProvider;
  tools: Readonly<Record<string, ToolDefinition>>;
  logger?: Logger;
}

export interface ToolCallOptions {
  deadline?: number;
  subjectId?: string;
}

// ─── Session ─────────────────────────────────────────────────────────────────

export class ToolSession {
  private calls = 0;

  private constructor(
    private readonly options: ToolSessionOptions,
    /**
     * Undefined when no policy had loaded at start. Each call then uses the
     * store's current snapshot and is denied while there is none.
     */
    readonly snapshot: PolicySnapshot | undefined,
    private readonly logger: Logger,
  ) {}

  static async start(options: ToolSessionOptions): Promise<ToolSession> {
    const snapshot = await options.policy.acquire();
    const logger = (options.logger ?? silentLogger).child({ correlationId: options.sessionId });
    logger.info('Tool session started', { policyVersion: snapshot?.version ?? null });
    return new ToolSession(options, snapshot, logger);
  }

  get sessionId(): string {
    return this.options.sessionId;
  }

  /**
   * Authorize and run one tool. A DENY is returned, not thrown, with the
   * message the agent may relay.
   */
  async invoke(
    name: string,
    params: Record<string, unknown> = {},
    options: ToolCallOptions = {},
  ): Promise<ToolCallResult> {
    this.calls += 1;
    const requestId = `${this.options.sessionId}:${this.calls}`;
    const definition = this.options.tools[name];

    const credential = await this.options.credentials();
    const authorization = await this.options.gateway.authorize(
      { credential, operation: { kind: 'tool', name }, params },
      {
        requestId,
        deadline: options.deadline,
        snapshot: this.snapshot,
        resolveResource: definition?.resolver?.(params),
        subjectId: options.subjectId,
      },
    );

    if (!isAllowed(authorization)) {
      const { denialReason, role } = authorization.decision;
      return {
        outcome: 'DENY',
        message: publicMessage(denialReason ?? 'AUTHORIZATION_DENIED', role),
        ledgerSequenceNo: authorization.ledgerSequenceNo,
      };
    }
    if (!definition) {
      throw new Error(`No handler registered for tool "${name}"`);
    }

    const { principal, decision } = authorization;
    const output = await definition.run({
      principal,
      params,
      scopeFilter: decision.scopeFilterApplied,
      requestId,
      deadline: options.deadline,
    });

    const filter = decision.scopeFilterApplied;
    const scopeRow = definition.scopeRow;
    let records = output.records ?? [];
    if (filter && scopeRow) {
      const before = records.length;
      records = records.filter((record) => matchesScope(filter, scopeRow(record)));
      if (records.length < before) {
        this.logger.warn('Tool returned records outside the caller scope', {
          tool: name,
          dropped: before - records.length,
        });
      }
    }
    records = records.map((record) => maskRecord(record, decision.fieldMask));

    let text: string | null = null;
    if (output.text !== undefined) {
      const screened = await this.options.router.screenOutput(principal, output.text, {
        requestId,
        deadline: options.deadline,
      });
      text = screened.text;
    }

    return { outcome: 'ALLOW', records, text, ledgerSequenceNo: authorization.ledgerSequenceNo };
  }
}
