export * from './access';
export * from './case-machine';
export * from './dashboard';
export * from './dates';
export * from './inmate-machine';
export * from './inputs';
export * from './result';
