/**
 * @module handles/open
 *
 * Opening an independent {@link ReadHandle} on a backing address.
 *
 * | Address | Handle |
 * |---------|--------|
 * | `https://cdn.example.com/archive.bin` | {@link HttpHandle} |
 * | `s3://bucket/key.bin` | {@link S3Handle} |
 * | `file:///srv/archive.bin` or `./archive.bin` | {@link LocalHandle} |
 */

import { fileURLToPath } from 'node:url';
import type { ReadHandle } from './handle.js';
import { HttpHandle, type HttpHandleOptions } from './http.js';
import { LocalHandle } from './local.js';
import { S3Handle, type S3HandleOptions } from './s3.js';

export interface OpenAddressOptions {
  http?: HttpHandleOptions;
  s3?: S3HandleOptions;
}

export type AddressKind = 'http' | 's3' | 'file';

export function addressKind(address: string): AddressKind {
  if (/^https?:\/\//i.test(address)) return 'http';
  if (address.startsWith('s3://')) return 's3';
  return 'file';
}

/**
 * Open a fresh read-only handle on `address`.
 *
 * @throws {Error} If the address is malformed or the file cannot be opened.
 */
export async function openAddress(address: string, options: OpenAddressOptions = {}): Promise<ReadHandle> {
  switch (addressKind(address)) {
    case 'http':
      return new HttpHandle(address, options.http);
    case 's3':
      return new S3Handle(address, options.s3);
    case 'file':
      return LocalHandle.open(address.startsWith('file:') ? fileURLToPath(address) : address);
  }
}
