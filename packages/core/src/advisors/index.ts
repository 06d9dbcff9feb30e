export { forecast } from './forecast.js';
export type { ForecastOptions } from './forecast.js';
export { summarizeSpending } from './summary.js';
export type { SpendingRow } from './summary.js';
export { optimizeDebts, compareMethods, orderDebts } from './debt.js';
export { calculateSavingsPlan, simulateSuccess } from './savings.js';
export type { SavingsGoal, SavingsOptions } from './savings.js';
export { EmergencyFundAdvisor, adjustmentFactor } from './emergency-fund.js';
export type { EmergencyFundConfig, HouseholdProfile } from './emergency-fund.js';
export { getStrategy } from './investment.js';
export { monthlyTotals } from './monthly.js';
export {
    mean,
    sampleStdDev,
    normalCdf,
    inverseNormalCdf,
    criticalValue,
    mulberry32,
    normalSampler,
    round2,
} from './stats.js';
export type { RandomSource } from './stats.js';
export { advisoryError } from './types.js';
export type { AdvisoryResult } from './types.js';
