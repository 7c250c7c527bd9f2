export type * from './conversation';
export type * from './persona';
export type * from './providers';
export type * from './speech';
export type * from './api';
