/**
 * AI Behaviors Export
 * Central export for all AI behavior implementations
 */

export { BalancedAI } from './BalancedAI';
