export * from './common';
export * from './information-mart';
export * from './mapping';
export * from './model';
export * from './project';
export * from './scope';
export * from './source-system';
