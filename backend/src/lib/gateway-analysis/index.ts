export * from './metric-catalog.js';
export * from './window-chunker.js';
export * from './sample-collector.js';
export * from './idle-aggregator.js';
export * from './summary-builder.js';
export * from './gateway-analyzer.js';
