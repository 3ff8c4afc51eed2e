// src/index.ts
export * from './ble';
export * from '@mdoc-proximity/core';
