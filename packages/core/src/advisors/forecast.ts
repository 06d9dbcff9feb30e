/**
 * Budget forecaster: trailing moving average over monthly totals.
 */

import { FORECAST_DEFAULTS } from '../types/index.js';
import type { ForecastReport } from '../types/index.js';
import { monthlyTotals } from './monthly.js';
import { criticalValue, mean, round2, sampleStdDev } from './stats.js';
import { advisoryError } from './types.js';
import type { AdvisoryResult } from './types.js';

export interface ForecastOptions {
    windowSize?: number;
    confidenceLevel?: number;
}

/**
 * Forecast next month's total from transaction history.
 *
 * With fewer months than the window, the plain mean of all months is
 * returned as a degraded forecast without an interval.
 *
 * @param history - Rows with ISO date and amount (typically expense records)
 */
export function forecast(
    history: readonly unknown[],
    options: ForecastOptions = {}
): AdvisoryResult<ForecastReport> {
    const windowSize = options.windowSize ?? FORECAST_DEFAULTS.WINDOW_SIZE;
    const confidenceLevel = options.confidenceLevel ?? FORECAST_DEFAULTS.CONFIDENCE_LEVEL;

    try {
        if (!Number.isInteger(windowSize) || windowSize < 1) {
            throw new Error(`Window size must be a positive integer (got ${windowSize})`);
        }
        if (!(confidenceLevel > 0 && confidenceLevel < 1)) {
            throw new Error(`Confidence level must be between 0 and 1 (got ${confidenceLevel})`);
        }

        const months = monthlyTotals(history, 'No valid historical data available');
        const method = `${windowSize}-month moving average`;

        if (months.length < windowSize) {
            return {
                ok: true,
                report: {
                    prediction: round2(mean(months)),
                    confidenceInterval: null,
                    method: `${method} (insufficient data)`,
                    confidenceLevel,
                    degraded: true,
                    months: months.length,
                },
            };
        }

        const window = months.slice(-windowSize);
        const center = mean(window);
        // A one-month window has no spread
        const spread = windowSize > 1 ? sampleStdDev(window) : 0;
        const margin = criticalValue(confidenceLevel) * spread;

        return {
            ok: true,
            report: {
                prediction: round2(center),
                confidenceInterval: [round2(center - margin), round2(center + margin)],
                method,
                confidenceLevel,
                degraded: false,
                months: months.length,
            },
        };
    } catch (e) {
        return advisoryError(e);
    }
}
