import { Types } from 'mongoose';
import { duplicateKeyError } from '../../test/fakes/duplicate-key';
import { asObjectId, isDuplicateKeyError, retryOnDuplicateKey } from './mongo-errors';

describe('mongo-errors', () => {
  it('recognises only E11000 server errors as duplicates', () => {
    expect(isDuplicateKeyError(duplicateKeyError())).toBe(true);
    expect(isDuplicateKeyError(new Error('E11000 duplicate key error'))).toBe(false);
    expect(isDuplicateKeyError(undefined)).toBe(false);
  });

  it('asObjectId keeps ObjectIds and parses strings', () => {
    const id = new Types.ObjectId();
    expect(asObjectId(id)).toBe(id);
    expect(asObjectId(id.toHexString()).equals(id)).toBe(true);
  });

  describe('retryOnDuplicateKey', () => {
    it('retries after a duplicate key and returns the next result', async () => {
      const fn = jest.fn().mockRejectedValueOnce(duplicateKeyError()).mockResolvedValueOnce('ok');
      await expect(retryOnDuplicateKey(fn)).resolves.toBe('ok');
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('gives up after the configured attempts', async () => {
      const err = duplicateKeyError();
      const fn = jest.fn().mockRejectedValue(err);
      await expect(retryOnDuplicateKey(fn, 2)).rejects.toBe(err);
      expect(fn).toHaveBeenCalledTimes(2);
    });

    it('propagates other errors immediately', async () => {
      const fn = jest.fn().mockRejectedValue(new Error('boom'));
      await expect(retryOnDuplicateKey(fn)).rejects.toThrow('boom');
      expect(fn).toHaveBeenCalledTimes(1);
    });
  });
});
