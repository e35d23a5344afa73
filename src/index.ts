export * from './encoding/index.js';
export * from './signature/methodSignature.js';
export { buildMethodSignature } from './signature/buildSignature.js';
export {
  methodValueSize,
  pointerSize,
  sizeAndAlignment,
  toKoffiType,
  type KoffiType,
  type TypeLayout,
} from './layout/typeLayout.js';
export * from './info/index.js';
export * from './header/index.js';
export * from './errors.js';
export { loadOptionalConfig, CONFIG_FILE_NAME, type EncodingToolConfig } from './dx/config.js';
export { isDebugEnabled, setDebugEnabled } from './dx/logger.js';
export { warn, type EncodingWarning, type EncodingWarningCode } from './dx/warnings.js';
