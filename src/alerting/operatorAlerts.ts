/**
 * Operator Alerts
 *
 * Security-relevant conditions that need a human: isolation breaches,
 * demographic content leaking into generated output, repeated denials for
 * one principal, role configuration anomalies and ledger mutation attempts.
 *
 * Alerts are raised separately from the per-request response. Delivery goes
 * through pluggable transports; production wires a logging transport (picked
 * up by the log pipeline) and tests use the in-memory one.
 *
 * @module alerting/operatorAlerts
 */

import { randomUUID } from 'node:crypto';
import type { Logger } from '../logging/index.js';

// ─── Types ───────────────────────────────────────────────────────────────────

export type AlertSeverity = 'critical' | 'high' | 'warning';

export type OperatorAlertKind =
  | 'isolation_violation'
  | 'demographic_output_leak'
  | 'repeated_denials'
  | 'role_anomaly'
  | 'ledger_mutation_attempt'
  | 'ledger_unavailable';

export interface OperatorAlert {
  id: string;
  kind: OperatorAlertKind;
  severity: AlertSeverity;
  principalId: string | null;
  summary: string;
  details: Record<string, unknown>;
  raisedAt: Date;
}

export type OperatorAlertInput = Omit<OperatorAlert, 'id' | 'raisedAt'>;

/** Delivers an alert. Returns true if accepted. */
export interface AlertTransport {
  readonly name: string;
  send(alert: OperatorAlert): boolean;
}

export interface AlertSink {
  raise(input: OperatorAlertInput): OperatorAlert;
}

export interface OperatorAlerts extends AlertSink {
  /** Most recent alerts, oldest first. */
  recent(): readonly OperatorAlert[];
}

// ─── Transports ──────────────────────────────────────────────────────────────

const LOG_LEVEL_FOR: Record<AlertSeverity, 'fatal' | 'error' | 'warn'> = {
  critical: 'fatal',
  high: 'error',
  warning: 'warn',
};

export function createLogAlertTransport(logger: Logger): AlertTransport {
  return {
    name: 'log',
    send(alert) {
      const metadata = {
        alertId: alert.id,
        kind: alert.kind,
        severity: alert.severity,
        principalId: alert.principalId,
        ...alert.details,
      };
      const level = LOG_LEVEL_FOR[alert.severity];
      if (level === 'warn') {
        logger.warn(`Operator alert: ${alert.summary}`, metadata);
      } else {
        logger[level](`Operator alert: ${alert.summary}`, undefined, metadata);
      }
      return true;
    },
  };
}

export interface InMemoryAlertTransport extends AlertTransport {
  readonly sent: OperatorAlert[];
}

export function createInMemoryAlertTransport(): InMemoryAlertTransport {
  const sent: OperatorAlert[] = [];
  return {
    name: 'memory',
    sent,
    send(alert) {
      sent.push(alert);
      return true;
    },
  };
}

// ─── Implementation ──────────────────────────────────────────────────────────

export interface OperatorAlertsOptions {
  transports: AlertTransport[];
  logger?: Logger;
  /** Alerts kept for {@link OperatorAlerts.recent}. Defaults to 500. */
  historyLimit?: number;
  clock?: () => Date;
}

export function createOperatorAlerts(options: OperatorAlertsOptions): OperatorAlerts {
  const historyLimit = options.historyLimit ?? 500;
  const clock = options.clock ?? (() => new Date());
  const history: OperatorAlert[] = [];

  return {
    raise(input) {
      const alert: OperatorAlert = { ...input, id: randomUUID(), raisedAt: clock() };
      history.push(alert);
      if (history.length > historyLimit) history.shift();

      for (const transport of options.transports) {
        const accepted = transport.send(alert);
        if (!accepted) {
          options.logger?.warn('Alert transport rejected alert', {
            transport: transport.name,
            alertId: alert.id,
            kind: alert.kind,
          });
        }
      }
      return alert;
    },
    recent() {
      return [...history];
    },
  };
}
