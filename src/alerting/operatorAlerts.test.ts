import { describe, it, expect } from 'vitest';
import { createLogger, type LogEntry } from '../logging/index.js';
import {
  createInMemoryAlertTransport,
  createLogAlertTransport,
  createOperatorAlerts,
  type AlertTransport,
} from './operatorAlerts.js';

const RAISED_AT = new Date('2026-02-01T00:00:00.000Z');

describe('createOperatorAlerts', () => {
  it('delivers to every transport and keeps history', () => {
    const memory = createInMemoryAlertTransport();
    const alerts = createOperatorAlerts({ transports: [memory], clock: () => RAISED_AT });

    const alert = alerts.raise({
      kind: 'repeated_denials',
      severity: 'warning',
      principalId: 'b-1',
      summary: '5 denials in 300s',
      details: { count: 5 },
    });

    expect(alert.raisedAt).toBe(RAISED_AT);
    expect(alert.id).toMatch(/^[0-9a-f-]{36}$/);
    expect(memory.sent).toEqual([alert]);
    expect(alerts.recent()).toEqual([alert]);
  });

  it('bounds the history', () => {
    const alerts = createOperatorAlerts({ transports: [], historyLimit: 2 });
    for (const summary of ['a', 'b', 'c']) {
      alerts.raise({ kind: 'role_anomaly', severity: 'warning', principalId: null, summary, details: {} });
    }
    expect(alerts.recent().map((a) => a.summary)).toEqual(['b', 'c']);
  });

  it('logs transports that refuse an alert', () => {
    const entries: LogEntry[] = [];
    const refusing: AlertTransport = { name: 'pager', send: () => false };
    const alerts = createOperatorAlerts({
      transports: [refusing],
      logger: createLogger({ output: (e) => entries.push(e) }),
    });

    alerts.raise({ kind: 'isolation_violation', severity: 'critical', principalId: null, summary: 'x', details: {} });

    expect(entries).toHaveLength(1);
    expect(entries[0]?.metadata).toMatchObject({ transport: 'pager', kind: 'isolation_violation' });
  });
});

describe('createLogAlertTransport', () => {
  it('maps severity to log level', () => {
    const entries: LogEntry[] = [];
    const transport = createLogAlertTransport(createLogger({ output: (e) => entries.push(e) }));
    const alerts = createOperatorAlerts({ transports: [transport] });

    alerts.raise({ kind: 'isolation_violation', severity: 'critical', principalId: null, summary: 'breach', details: {} });
    alerts.raise({ kind: 'ledger_mutation_attempt', severity: 'high', principalId: 'u', summary: 'delete', details: {} });
    alerts.raise({ kind: 'repeated_denials', severity: 'warning', principalId: 'u', summary: 'noisy', details: { count: 5 } });

    expect(entries.map((e) => [e.level, e.message])).toEqual([
      ['fatal', 'Operator alert: breach'],
      ['error', 'Operator alert: delete'],
      ['warn', 'Operator alert: noisy'],
    ]);
    expect(entries[2]?.metadata).toMatchObject({ kind: 'repeated_denials', count: 5 });
  });
});
