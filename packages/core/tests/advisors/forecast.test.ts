import { describe, it, expect } from 'vitest';
import { forecast } from '../../src/advisors/forecast.js';
import { ForecastReportSchema } from '../../src/types/index.js';

function history(totals: Record<string, number>) {
    return Object.entries(totals).map(([date, amount]) => ({ date, amount }));
}

describe('forecast', () => {
    it('should predict the trailing window mean with a 95% interval', () => {
        const result = forecast(history({ '2026-01-10': 100, '2026-02-10': 200, '2026-03-10': 300 }));

        expect(result).toEqual({
            ok: true,
            report: {
                prediction: 200,
                confidenceInterval: [4, 396],
                method: '3-month moving average',
                confidenceLevel: 0.95,
                degraded: false,
                months: 3,
            },
        });
    });

    it('should give a zero-width interval for identical months', () => {
        const result = forecast(history({ '2026-01-01': 150, '2026-02-01': 150, '2026-03-01': 150 }));
        expect(result.ok && result.report.prediction).toBe(150);
        expect(result.ok && result.report.confidenceInterval).toEqual([150, 150]);
    });

    it('should only use the last windowSize months', () => {
        const result = forecast(history({
            '2025-12-05': 1000,
            '2026-01-05': 100,
            '2026-02-05': 200,
            '2026-03-05': 300,
        }));
        expect(result.ok && result.report.prediction).toBe(200);
        expect(result.ok && result.report.months).toBe(4);
    });

    it('should sum records within a month and count empty months as 0', () => {
        const result = forecast([
            { date: '2026-01-03', amount: 100 },
            { date: '2026-01-20', amount: 200 },
            { date: '2026-03-15', amount: 300 },
        ]);
        // Months: 300, 0, 300
        expect(result.ok && result.report.prediction).toBe(200);
        expect(result.ok && result.report.months).toBe(3);
    });

    it('should degrade to the plain mean with too little history', () => {
        const result = forecast(history({ '2026-02-01': 100, '2026-03-01': 300 }));

        expect(result).toEqual({
            ok: true,
            report: {
                prediction: 200,
                confidenceInterval: null,
                method: '3-month moving average (insufficient data)',
                confidenceLevel: 0.95,
                degraded: true,
                months: 2,
            },
        });
    });

    it('should honour window size and confidence level', () => {
        const result = forecast(
            history({ '2026-01-10': 100, '2026-02-10': 200, '2026-03-10': 300 }),
            { windowSize: 3, confidenceLevel: 0.9 }
        );
        expect(result.ok && result.report.confidenceInterval).toEqual([35.51, 364.49]);

        const single = forecast(history({ '2026-01-10': 100, '2026-02-10': 200 }), { windowSize: 1 });
        expect(single.ok && single.report).toMatchObject({
            prediction: 200,
            confidenceInterval: [200, 200],
            method: '1-month moving average',
        });
    });

    it('should return an error for empty history', () => {
        expect(forecast([])).toEqual({ ok: false, error: 'No valid historical data available' });
    });

    it('should return an error for rows without an amount', () => {
        const result = forecast([{ date: '2026-01-01' }]);
        expect(result.ok).toBe(false);
        expect(!result.ok && result.error).toContain('No valid historical data available: 0.amount');
    });

    it('should reject invalid parameters', () => {
        const rows = history({ '2026-01-01': 100 });
        expect(forecast(rows, { windowSize: 0 })).toEqual({
            ok: false,
            error: 'Window size must be a positive integer (got 0)',
        });
        expect(forecast(rows, { confidenceLevel: 1 })).toEqual({
            ok: false,
            error: 'Confidence level must be between 0 and 1 (got 1)',
        });
    });
});

describe('forecast report shape', () => {
    it('should satisfy the report schema, degraded or not', () => {
        const full = forecast(history({ '2026-01-10': 100, '2026-02-10': 200, '2026-03-10': 300 }));
        const single = forecast(history({ '2026-03-10': 300 }));
        for (const result of [full, single]) {
            expect(result.ok).toBe(true);
            if (result.ok) expect(ForecastReportSchema.safeParse(result.report).success).toBe(true);
        }
    });
});
