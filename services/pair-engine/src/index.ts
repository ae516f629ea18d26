export { TickChannel } from '@/application/channel/TickChannel';
export { TickDispatcher } from '@/application/handlers/TickDispatcher';
export type { Logger } from '@/application/interfaces/Logger';
export type { MetricsCollector } from '@/application/interfaces/MetricsCollector';
export type { TickConsumer } from '@/application/interfaces/TickConsumer';
export type { TickSource } from '@/application/interfaces/TickSource';
export { MarketQueryService } from '@/application/services/MarketQueryService';
export { PairAnalyzer, computeSpread, estimateHedgeRatio } from '@/application/services/PairAnalyzer';
export { ResampleScheduler } from '@/application/services/ResampleScheduler';
export { Resampler, aggregateBars } from '@/application/services/Resampler';
export { MarketDataStore } from '@/application/stores/MarketDataStore';
export { TickBuffer } from '@/application/stores/TickBuffer';
export { createPairEngine, type PairEngine, type PairEngineDependencies } from '@/bootstrap/createPairEngine';
export { type AppConfig, loadConfig } from '@/config/AppConfig';
export { adfTest } from '@/domain/analytics/adf';
export * from '@/domain/errors/PairEngineError';
export type { OhlcvBar } from '@/domain/models/OhlcvBar';
export type * from '@/domain/models/PairAnalysis';
export type { Tick, TickSink } from '@/domain/models/Tick';
export { TIMEFRAMES, TIMEFRAME_SECONDS, type Timeframe, parseTimeframe } from '@/domain/models/Timeframe';
export type { BarRepository } from '@/domain/repositories/BarRepository';
export type { TickBroadcaster } from '@/domain/repositories/TickBroadcaster';
