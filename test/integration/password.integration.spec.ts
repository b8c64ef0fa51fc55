/**
 * Password Service Integration Tests
 *
 * Runs the real argon2id hasher.
 */

import { PasswordService } from '../../src/core/security/password.service';

describe('PasswordService', () => {
  const service = new PasswordService();

  it('should produce an argon2id hash that verifies', async () => {
    const hash = await service.hash('test-secret');

    expect(hash.startsWith('$argon2id$')).toBe(true);
    expect(await service.verify(hash, 'test-secret')).toBe(true);
    expect(await service.verify(hash, 'wrong-secret')).toBe(false);
  });

  it('should salt every hash', async () => {
    expect(await service.hash('test-secret')).not.toBe(await service.hash('test-secret'));
  });

  it('should reject malformed hashes', async () => {
    expect(await service.verify('not-a-hash', 'test-secret')).toBe(false);
  });
});
