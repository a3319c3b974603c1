export * from './common';
export * from './config';
export * from './download';
export * from './install';
export * from './log';
export * from './package-manager';
export * from './path';
export * from './process';
export * from './ui';
