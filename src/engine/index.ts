/**
 * Engine exports
 */

export { BayesClassifier } from './classifier';
export { FrequencyLedger, type UntrainOutcome } from './ledger';
