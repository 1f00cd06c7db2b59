/**
 * Multi-Channel Fuser
 *
 * Merges independently produced channel results (news, social forum,
 * microblog) with configurable base weights. Channels that produced no
 * items are excluded and the remaining weights renormalized; a missing
 * channel is absence, not a zero score.
 *
 * Labels use a five-tier scale (strong/weak positive, neutral, weak/strong
 * negative) that is independent from the three-tier category labels.
 */

import { normalizeWeights } from '../core/math';
import { unavailable, withReasons, type SignalResult } from '../core/result';
import { createCombinedSentiment } from './combined-fuser';
import {
    CHANNELS,
    type CategoryScore,
    type Channel,
    type ChannelLabel,
    type ChannelResult,
    type CombinedSentiment,
    type FusionComponent,
} from './sentiment-types';

export type ChannelWeights = Record<Channel, number>;

export interface MultiChannelOptions {
    baseWeights: ChannelWeights;
    strongThreshold: number;
    weakThreshold: number;
}

export const DEFAULT_CHANNEL_OPTIONS: MultiChannelOptions = {
    baseWeights: { news: 0.4, social_forum: 0.3, microblog: 0.3 },
    strongThreshold: 0.2,
    weakThreshold: 0.05,
};

export function channelLabelFromScore(
    score: number,
    strongThreshold: number = DEFAULT_CHANNEL_OPTIONS.strongThreshold,
    weakThreshold: number = DEFAULT_CHANNEL_OPTIONS.weakThreshold,
): ChannelLabel {
    if (score > strongThreshold) return 'strong_positive';
    if (score > weakThreshold) return 'weak_positive';
    if (score < -strongThreshold) return 'strong_negative';
    if (score < -weakThreshold) return 'weak_negative';
    return 'neutral';
}

/**
 * Summarize an aggregated category as a channel result.
 */
export function channelFromCategory(channel: Channel, category: CategoryScore): ChannelResult {
    return {
        channel,
        score: category.score,
        confidence: category.confidence,
        itemCount: category.itemCount,
    };
}

export function fuseChannels(
    tickerOrSector: string,
    results: Array<ChannelResult | null | undefined>,
    options: Partial<MultiChannelOptions> = {},
): SignalResult<CombinedSentiment<ChannelLabel>> {
    const opts = { ...DEFAULT_CHANNEL_OPTIONS, ...options };
    const baseWeights = normalizeWeights(opts.baseWeights);
    const reasons: string[] = [];

    const byChannel = new Map<Channel, ChannelResult>();
    for (const result of results) {
        if (!result) continue;
        if (byChannel.has(result.channel)) {
            console.warn(`[MultiChannelFuser] Duplicate ${result.channel} result ignored`);
            reasons.push(`${result.channel}: duplicate result ignored`);
            continue;
        }
        byChannel.set(result.channel, result);
    }

    const active: ChannelResult[] = [];
    for (const channel of CHANNELS) {
        const result = byChannel.get(channel);
        if (!result) {
            reasons.push(`${channel}: missing`);
        } else if (result.itemCount <= 0) {
            reasons.push(`${channel}: no items`);
        } else {
            active.push(result);
        }
    }

    if (active.length === 0) {
        return unavailable(reasons);
    }

    const activeBase: Record<string, number> = {};
    for (const result of active) {
        activeBase[result.channel] = baseWeights[result.channel];
    }
    const weights = normalizeWeights(activeBase);

    const components: FusionComponent[] = active.map(result => ({
        source: result.channel,
        score: result.score,
        confidence: result.confidence,
        itemCount: result.itemCount,
        baseWeight: baseWeights[result.channel],
        weight: weights[result.channel],
    }));

    const score = components.reduce((acc, c) => acc + c.weight * c.score, 0);
    const confidence = components.reduce((acc, c) => acc + c.weight * c.confidence, 0);

    return withReasons(
        createCombinedSentiment({
            tickerOrSector,
            score,
            label: channelLabelFromScore(score, opts.strongThreshold, opts.weakThreshold),
            confidence,
            components,
        }),
        reasons,
    );
}
