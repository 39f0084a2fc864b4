/**
 * RGB0 capture format exports.
 * @module rgb0
 */
export * from './constants';
export * from './errors';
export * from './types';
export * from './util';
export * from './source';
export * from './header';
export * from './ports';
export * from './gamma';
export * from './layout';
export * from './reader';
export * from './writer';
export * from './summary';
