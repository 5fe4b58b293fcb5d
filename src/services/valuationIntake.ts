/**
 * Valuation Intake
 *
 * Turns a raw JSON record from the off-chain valuation reporter into a
 * ValuationReport. Amounts arrive as human decimals, either JSON numbers or
 * strings ("1250.25"); they become 1e6 micro-units here.
 */

import { z } from 'zod';
import { VaultError } from '../core/errors';
import { ValuationReport } from '../types';
import { parseAmount, parseSignedAmount } from '../utils/math';

const decimalInput = z.union([z.string().trim().min(1), z.number()]);

function toMicro(parse: (value: string | number) => bigint) {
    return (value: string | number, ctx: z.RefinementCtx): bigint => {
        try {
            return parse(value);
        } catch (err: unknown) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: err instanceof Error ? err.message : String(err),
            });
            return z.NEVER;
        }
    };
}

const unsignedAmount = decimalInput.transform(toMicro(parseAmount));
const signedAmount = decimalInput.transform(toMicro(parseSignedAmount));

export const valuationReportSchema = z.object({
    deploymentId: z.string().min(1),
    orcaPositionsValue: unsignedAmount,
    driftEquityValue: unsignedAmount,
    uncollectedFees: unsignedAmount,
    unrealizedPnl: signedAmount,
    timestamp: z.number().int().nonnegative(),
});

export function parseValuationReport(raw: unknown): ValuationReport {
    const parsed = valuationReportSchema.safeParse(raw);
    if (!parsed.success) {
        const issues = parsed.error.issues.map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`);
        throw new VaultError('InvalidValuation', `malformed valuation report: ${issues.join('; ')}`, {
            issueCount: issues.length,
        });
    }
    return parsed.data;
}
