export * from './process-echo-wav';
export * from './process-lsb-wav';
