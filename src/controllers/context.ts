/**
 * What every controller receives besides its input: the gateway's ALLOW
 * for this request, the correlation id and the request deadline.
 *
 * @module controllers/context
 */

import type { AllowedAuthorization } from '../access/types.js';
import type { LedgerActor, LedgerViewer } from '../ledger/types.js';

export interface ControllerContext {
  access: AllowedAuthorization;
  requestId: string;
  deadline?: number;
}

export function actorOf(ctx: ControllerContext): LedgerActor {
  return { principalId: ctx.access.principal.id, role: ctx.access.principal.role, requestId: ctx.requestId };
}

/** Ledger reads are masked by the reader's own snapshot. */
export function viewerOf(ctx: ControllerContext): LedgerViewer {
  return { principalId: ctx.access.principal.id, role: ctx.access.principal.role, snapshot: ctx.access.policy };
}
