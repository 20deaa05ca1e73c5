export * from './types';
export * from './engine/Grid';
export * from './engine/Random';
export * from './engine/Validator';
export * from './engine/Solver';
export * from './engine/Generator';
export * from './engine/SessionState';
export * from './engine/UndoHistory';
export * from './engine/GameSession';
export * from './engine/Command';
export * from './engine/GameController';
export * from './defaults';
export * from './errors';
