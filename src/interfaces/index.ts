export * from './audio-format.interface';
export * from './echo-params.interface';
export * from './stego-error.interface';
export * from './stego-result.interface';
