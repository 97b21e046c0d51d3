export * from './BaseIntentHandler';
export { QAHandler } from './QAHandler';
export { SummarizationHandler } from './SummarizationHandler';
export { CalculationHandler } from './CalculationHandler';
