// src/services/report-flow/index.ts

export { ReportFlowRunner, COMPLETION_REMINDER } from './ReportFlowRunner';
export type { ReportFlowOptions, Printer, Sleep } from './ReportFlowRunner';
