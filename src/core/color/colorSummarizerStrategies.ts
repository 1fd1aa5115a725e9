// src/core/color/colorSummarizerStrategies.ts

import type { ColorSpace, ColorStrategy, IColorSummarizer } from '../../@types/index.ts';
import { AverageColorSummarizer } from './strategies/AverageColorSummarizer.ts';
import { MostCommonColorSummarizer } from './strategies/MostCommonColorSummarizer.ts';
import { MonochromeLuminanceSummarizer } from './strategies/MonochromeLuminanceSummarizer.ts';

/**
 * Enumeration of the ways a tile can be reduced to one color.
 */
export enum SupportedSummarizerStrategies {
    Average = 'average',
    MostCommon = 'most-common',
    MonochromeLuminance = 'monochrome-luminance',
}

/**
 * Mapping of summarizer strategy identifiers to their corresponding implementations.
 */
export const ColorSummarizerStrategyMap: Record<SupportedSummarizerStrategies, IColorSummarizer> = {
    [SupportedSummarizerStrategies.Average]: new AverageColorSummarizer(),
    [SupportedSummarizerStrategies.MostCommon]: new MostCommonColorSummarizer(),
    [SupportedSummarizerStrategies.MonochromeLuminance]: new MonochromeLuminanceSummarizer(),
};

/**
 * Combines the aggregation choice with the active color space. Averaging a luminance image uses the
 * arithmetic mean; the most common value is picked the same way in either space.
 */
export function resolveSummarizerStrategy(strategy: ColorStrategy, colorSpace: ColorSpace): SupportedSummarizerStrategies {
    if (strategy === 'most-common') {
        return SupportedSummarizerStrategies.MostCommon;
    }
    return colorSpace === 'monochrome'
        ? SupportedSummarizerStrategies.MonochromeLuminance
        : SupportedSummarizerStrategies.Average;
}

export function getColorSummarizer(strategy: ColorStrategy, colorSpace: ColorSpace): IColorSummarizer {
    return ColorSummarizerStrategyMap[resolveSummarizerStrategy(strategy, colorSpace)];
}
