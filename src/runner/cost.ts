import type { AppConfig } from '../config.js'

export type Pricing = AppConfig['pricing']

export const estimateCost = (
  inputTokens: number,
  outputTokens: number,
  pricing: Pricing,
): number => {
  const raw =
    (inputTokens / 1000) * pricing.inputPer1k +
    (outputTokens / 1000) * pricing.outputPer1k
  const factor = 10 ** pricing.decimals
  return Math.round(raw * factor) / factor
}
