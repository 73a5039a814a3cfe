import { mkdtemp, rm } from 'fs/promises';
import os from 'os';
import path from 'path';
import { v4 as uuidv4 } from 'uuid';
import { AppConfig, loadConfig } from '../../config';
import { Services, createServices } from '../../container';
import { BlobStore, createFsBlobStore } from '../../services/blob.service';
import type { RequestContext, UserRole } from '../../types';
import { MemoryRepositories, createMemoryRepositories } from './memory-repositories';

export const START_TIME = new Date('2026-01-05T09:00:00.000Z');

export interface TestClock {
  now: () => Date;
  set(date: Date): void;
  advanceMinutes(minutes: number): void;
}

export function createClock(start: Date = START_TIME): TestClock {
  let current = new Date(start.getTime());
  return {
    now: () => new Date(current.getTime()),
    set(date) {
      current = new Date(date.getTime());
    },
    advanceMinutes(minutes) {
      current = new Date(current.getTime() + minutes * 60_000);
    },
  };
}

export interface TestContext {
  services: Services;
  repositories: MemoryRepositories;
  blobs: BlobStore;
  config: AppConfig;
  clock: TestClock;
  storageRoot: string;
  /** Insert an active user directly and return a context acting as them */
  seedUser(role: UserRole, groupId?: string | null): Promise<RequestContext>;
  cleanup(): Promise<void>;
}

export async function createTestContext(env: NodeJS.ProcessEnv = {}): Promise<TestContext> {
  const storageRoot = await mkdtemp(path.join(os.tmpdir(), 'medimg-test-'));
  const config = loadConfig({
    NODE_ENV: 'test',
    JWT_SECRET: 'test-secret',
    BCRYPT_ROUNDS: '4',
    STORAGE_ROOT: storageRoot,
    ...env,
  });
  const clock = createClock();
  const repositories = createMemoryRepositories();
  const blobs = createFsBlobStore(storageRoot);
  const services = createServices({ repositories, blobs, config, now: clock.now });

  let seeded = 0;

  return {
    services,
    repositories,
    blobs,
    config,
    clock,
    storageRoot,

    async seedUser(role, groupId = 'radiology') {
      seeded++;
      const user = await repositories.users.create({
        id: uuidv4(),
        username: `${role}_${seeded}`,
        password_hash: 'not-a-real-hash',
        role,
        group_id: groupId,
        created_at: clock.now(),
      });
      return {
        principal: { userId: user.id, role: user.role, groupId: user.group_id },
        ipAddress: '203.0.113.7',
        userAgent: 'vitest',
      };
    },

    async cleanup() {
      await rm(storageRoot, { recursive: true, force: true });
    },
  };
}

/** The principal's user id; fails the test if the context is anonymous */
export function userIdOf(ctx: RequestContext): string {
  if (!ctx.principal) {
    throw new Error('context has no principal');
  }
  return ctx.principal.userId;
}
