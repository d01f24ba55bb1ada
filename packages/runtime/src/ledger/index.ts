export {
  loadEmploymentHistory,
  loadActivationHistory,
  openPeriod,
  closePeriod,
  rescheduleOpenPeriod,
  checkLedgerPlan,
  applyLedgerPlan,
  type LedgerPlan,
} from './ledger.js';
