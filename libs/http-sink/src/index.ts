export * from './record';
export * from './charset';
export * from './placeholders';
export * from './messageBuffer';
export * from './config';
export * from './recordWriter';
export * from './factories';
