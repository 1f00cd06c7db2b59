/**
 * Relevance Classifier
 *
 * Keyword-density check for "is this text about markets/finance?".
 * Pure, no model involved. The verdict only picks the blend ratio
 * downstream; it never moves the sentiment value itself.
 */

import type { FinancialKeywordTable } from '../reference/reference-loader';

export interface RelevanceResult {
    isFinancial: boolean;
    confidence: number;
    keywordMatches: number;
}

const FINANCIAL_CONFIDENCE_THRESHOLD = 0.2;
const MIN_KEYWORD_MATCHES = 2;

/**
 * Classify text against a financial keyword table.
 *
 * Keywords match as substrings of the lower-cased text, so "share"
 * also counts inside "shares".
 */
export function classifyRelevance(text: string, table: FinancialKeywordTable): RelevanceResult {
    if (!text || !text.trim()) {
        return { isFinancial: false, confidence: 0, keywordMatches: 0 };
    }

    const lower = text.toLowerCase();
    let matches = 0;
    for (const keyword of table.keywords) {
        if (lower.includes(keyword)) matches++;
    }

    const wordCount = lower.split(/\s+/).filter(Boolean).length;
    const confidence = Math.min(1, matches / Math.max(1, wordCount * table.densityFactor));

    return {
        isFinancial: matches >= MIN_KEYWORD_MATCHES || confidence > FINANCIAL_CONFIDENCE_THRESHOLD,
        confidence,
        keywordMatches: matches,
    };
}
