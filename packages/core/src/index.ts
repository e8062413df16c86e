export * from './errors';
export * from './config';
export * from './element';
export * from './shape';
export * from './sequence';
export * from './parallel';
export * from './matrix';
