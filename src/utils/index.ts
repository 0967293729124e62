export * from './format-assets';
