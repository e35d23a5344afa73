export * from './methodInfo.js';
export * from './ivarInfo.js';
export * from './propertyInfo.js';
export * from './containerInfo.js';
