import type { Conversation } from "@teamline/protocol";
import { loadConfig, type ServerConfig } from "../config.js";
import { openMemoryDatabase } from "../db/database.js";
import { createContext, type ContextOverrides, type ServerContext } from "../context.js";
import { signToken } from "../auth/identity.js";

export const TEST_SECRET = "test-secret";
export const START_TIME = 1_700_000_000_000;

export interface TestClock {
  now(): number;
  advance(ms: number): void;
}

/** Strictly increasing clock; every read moves it forward by 1ms */
export function testClock(start = START_TIME): TestClock {
  let current = start;
  return {
    now: () => current++,
    advance: (ms) => {
      current += ms;
    },
  };
}

export function testConfig(env: NodeJS.ProcessEnv = {}): ServerConfig {
  return loadConfig({ JWT_SECRET: TEST_SECRET, INSTANCE_ID: "test-instance", ...env });
}

export interface TestWorld {
  ctx: ServerContext;
  clock: TestClock;
  /** alice ⇄ bob in org-1 */
  conversation: Conversation;
  /** Eve ⇄ bob in org-1; Eve's id is mixed-case */
  eveConversation: Conversation;
  token(userId: string): string;
}

/**
 * In-memory server context seeded with one organization (org-1), one project
 * (proj-1: alice, bob, carol as admin) and an alice/bob conversation.
 * dave belongs to the organization but not the project. Eve (id "Eve") is a
 * project member whose id keeps its case.
 */
export function createTestWorld(overrides: ContextOverrides = {}, env: NodeJS.ProcessEnv = {}): TestWorld {
  const clock = testClock();
  const ctx = createContext(testConfig(env), openMemoryDatabase(), { now: clock.now, ...overrides });

  for (const [id, name] of [
    ["alice", "Alice"],
    ["bob", "Bob"],
    ["carol", "Carol"],
    ["dave", "Dave"],
    ["Eve", "Eve"],
  ] as const) {
    ctx.profiles.upsert({ id, displayName: name });
    ctx.directory.addOrgMember("org-1", id);
  }
  ctx.directory.addProjectMember("proj-1", "alice");
  ctx.directory.addProjectMember("proj-1", "bob");
  ctx.directory.addProjectMember("proj-1", "carol", true);
  ctx.directory.addProjectMember("proj-1", "Eve");

  const conversation = ctx.conversations.findOrCreate("org-1", "alice", "bob");
  const eveConversation = ctx.conversations.findOrCreate("org-1", "Eve", "bob");

  return {
    ctx,
    clock,
    conversation,
    eveConversation,
    token: (userId) => signToken(TEST_SECRET, userId),
  };
}
