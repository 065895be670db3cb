export type * from './tokens';
export type * from './syntax';
export type * from './value';
