import { describe, it, expect, beforeEach } from 'vitest';
import { SetUserStatusUseCase } from '../setUserStatus.js';
import { NotFoundError } from '../../errors.js';
import { InMemoryUserRepo } from '../../../infra/db/inMemoryUserRepo.js';

describe('SetUserStatusUseCase', () => {
  let store: InMemoryUserRepo;
  let useCase: SetUserStatusUseCase;

  beforeEach(async () => {
    store = new InMemoryUserRepo();
    useCase = new SetUserStatusUseCase(store);
    await store.create({ name: 'Ada', email: 'ada@example.com', passwordHash: 'hashed:secret1', role: 'user', isActive: true });
  });

  it('should deactivate and reactivate a user', async () => {
    expect((await useCase.execute(1, false)).is_active).toBe(false);
    expect(store.allRows()[0].isActive).toBe(false);

    expect((await useCase.execute(1, true)).is_active).toBe(true);
  });

  it('should report a missing user', async () => {
    await expect(useCase.execute(5, false)).rejects.toThrow(NotFoundError);
  });
});
