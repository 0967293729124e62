export * from './typed-result-decoder';
