/**
 * Alerting Module
 *
 * Operator alerts for ledger outages, boundary breaches and repeated denials.
 */

export {
  type AlertSeverity,
  type AlertSink,
  type AlertTransport,
  type InMemoryAlertTransport,
  type OperatorAlert,
  type OperatorAlertInput,
  type OperatorAlertKind,
  type OperatorAlerts,
  type OperatorAlertsOptions,
  createInMemoryAlertTransport,
  createLogAlertTransport,
  createOperatorAlerts,
} from './operatorAlerts.js';
