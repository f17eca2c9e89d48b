/**
 * Generator Module
 * @module
 */

export { generateMarkets } from './batch.ts'
export type { BatchOptions, BatchResult, MarketGenerationResult, WrittenDocument } from './batch.ts'
