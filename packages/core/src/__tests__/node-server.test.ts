import { describe, it, expect } from 'vitest';
import { BadRequestError } from '../errors.js';
import { parseTransferMetadata } from '../transport/node-server.js';

const VALID = {
  id: '6f1c2e40-5d3e-11ef-8a2b-0242ac120002',
  filename: 'notes.txt',
  sizeBytes: 9,
  senderName: 'alice',
  senderAddress: '10.0.0.1:8080',
  receiverAddress: '10.0.0.2:8080',
};

describe('parseTransferMetadata', () => {
  it('should keep only the metadata fields', () => {
    expect(parseTransferMetadata({ ...VALID, status: 'completed' })).toEqual(VALID);
  });

  it('should reject non-objects', () => {
    expect(() => parseTransferMetadata('hello')).toThrow('Transfer metadata must be an object');
    expect(() => parseTransferMetadata(null)).toThrow(BadRequestError);
  });

  it('should name the first bad field', () => {
    expect(() => parseTransferMetadata({ ...VALID, filename: '' })).toThrow('Missing or invalid field: filename');
    expect(() => parseTransferMetadata({ ...VALID, sizeBytes: -1 })).toThrow('Missing or invalid field: sizeBytes');
    expect(() => parseTransferMetadata({ ...VALID, sizeBytes: 1.5 })).toThrow('Missing or invalid field: sizeBytes');
  });

  it('should require a host:port sender address', () => {
    expect(() => parseTransferMetadata({ ...VALID, senderAddress: 'alice' })).toThrow('Invalid sender address: alice');
  });
});
