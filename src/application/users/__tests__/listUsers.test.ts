import { describe, it, expect, beforeEach } from 'vitest';
import { ListUsersUseCase } from '../listUsers.js';
import { InMemoryUserRepo } from '../../../infra/db/inMemoryUserRepo.js';

describe('ListUsersUseCase', () => {
  let store: InMemoryUserRepo;
  let useCase: ListUsersUseCase;

  beforeEach(async () => {
    store = new InMemoryUserRepo();
    useCase = new ListUsersUseCase(store);

    for (let i = 1; i <= 25; i++) {
      await store.create({
        name: `User ${i}`,
        email: `user${i}@example.com`,
        passwordHash: 'hashed:secret1',
        role: 'user',
        isActive: true,
      });
    }
  });

  it('should return the first page with defaults', async () => {
    const result = await useCase.execute({});

    expect(result.users).toHaveLength(10);
    expect(result.users[0].id).toBe(1);
    expect(result.meta).toEqual({ current_page: 1, per_page: 10, total: 25, total_pages: 3 });
  });

  it('should return the partial last page', async () => {
    const result = await useCase.execute({ page: 3, limit: 10 });

    expect(result.users.map((u) => u.id)).toEqual([21, 22, 23, 24, 25]);
    expect(result.meta.current_page).toBe(3);
  });

  it('should return an empty page past the end', async () => {
    const result = await useCase.execute({ page: 9, limit: 10 });

    expect(result.users).toEqual([]);
    expect(result.meta.total).toBe(25);
  });

  it('should clamp out-of-range input', async () => {
    const result = await useCase.execute({ page: 0, limit: 1000 });

    expect(result.users).toHaveLength(25);
    expect(result.meta).toEqual({ current_page: 1, per_page: 100, total: 25, total_pages: 1 });
  });

  it('should leave soft-deleted users out of rows and total', async () => {
    await store.delete(1);
    await store.delete(2);

    const result = await useCase.execute({ limit: 5 });

    expect(result.users[0].id).toBe(3);
    expect(result.meta.total).toBe(23);
    expect(result.meta.total_pages).toBe(5);
  });
});
