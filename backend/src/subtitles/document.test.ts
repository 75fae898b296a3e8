import { describe, it, expect } from 'vitest';
import { SubtitleDocument } from './document';
import { PreconditionError, TransactionError } from './errors';

describe('SubtitleDocument', () => {
  it('should insert, replace and delete text', () => {
    const doc = new SubtitleDocument('abc');
    doc.insert(3, 'def');
    doc.replace(0, 1, 'A');
    doc.delete(1, 3);
    expect(doc.text).toBe('Adef');
    expect(doc.length).toBe(4);
  });

  it('should reject ranges outside the text', () => {
    const doc = new SubtitleDocument('abc');
    expect(() => doc.replace(2, 5, 'x')).toThrow(RangeError);
    expect(() => doc.delete(2, 1)).toThrow(RangeError);
  });
});

describe('SubtitleDocument.transact', () => {
  it('should return the result of the edit', () => {
    const doc = new SubtitleDocument('abc');
    const result = doc.transact(() => {
      doc.insert(0, 'x');
      return doc.length;
    });
    expect(result).toBe(4);
    expect(doc.text).toBe('xabc');
    expect(doc.inTransaction).toBe(false);
  });

  it('should restore the text and wrap unexpected errors', () => {
    const doc = new SubtitleDocument('abc');
    const failure = new Error('boom');

    let caught: unknown;
    try {
      doc.transact(() => {
        doc.insert(3, 'd');
        throw failure;
      });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(TransactionError);
    if (!(caught instanceof TransactionError)) return;
    expect(caught.message).toBe('Edit rolled back: boom');
    expect(caught.code).toBe('transaction');
    expect(caught.cause).toBe(failure);
    expect(doc.text).toBe('abc');
  });

  it('should rethrow engine errors unchanged', () => {
    const doc = new SubtitleDocument('abc');
    const failure = new PreconditionError('No subtitle to merge');

    expect(() =>
      doc.transact(() => {
        doc.delete(0, 3);
        throw failure;
      })
    ).toThrow(failure);
    expect(doc.text).toBe('abc');
  });

  it('should roll back nested edits with the outer transaction', () => {
    const doc = new SubtitleDocument('abc');

    expect(() =>
      doc.transact(() => {
        doc.transact(() => {
          expect(doc.inTransaction).toBe(true);
          doc.insert(0, '1');
        });
        doc.insert(0, '2');
        throw new Error('late failure');
      })
    ).toThrow(TransactionError);
    expect(doc.text).toBe('abc');
    expect(doc.inTransaction).toBe(false);
  });
});
