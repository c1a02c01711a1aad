export * from './types';
export * from './aggregators';
export * from './composer';
export * from './region';
export * from './delivery-kpi';
export * from './normalize';
export * from './qualification';
export * from './record';
export * from './pipeline';
export * from './snapshot';
export * from './export';
