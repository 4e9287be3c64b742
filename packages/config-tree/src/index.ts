export * from './json';
export * from './values';
