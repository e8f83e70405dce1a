import { Redis } from "ioredis";
import type { ServerConfig } from "./config.js";
import type { Db } from "./db/database.js";
import { JwtIdentityVerifier, type IdentityVerifier } from "./auth/identity.js";
import { SqliteMembershipDirectory, type MembershipDirectory } from "./auth/membership.js";
import { ConversationStore } from "./chat/conversations.js";
import { MessageStore } from "./messages/store.js";
import { ChatService } from "./messages/lifecycle.js";
import { ProfileDirectory } from "./users/profiles.js";
import { MemoryTypingStore, RedisTypingStore, type TypingStore } from "./typing/store.js";
import { TypingService } from "./typing/service.js";
import { LocalNotificationBus, RedisNotificationBus, type NotificationBus } from "./notifications/bus.js";
import { InboxStore } from "./notifications/inbox-store.js";
import { NotificationPublisher } from "./notifications/publisher.js";
import { NotificationSubscriber } from "./notifications/subscriber.js";
import { NotificationService } from "./notifications/service.js";
import { ConnectionHub } from "./ws/hub.js";
import { Heartbeat } from "./ws/heartbeat.js";

/** Everything a route or socket handler needs, built once per process */
export interface ServerContext {
  config: ServerConfig;
  db: Db;
  hub: ConnectionHub;
  heartbeat: Heartbeat;
  identity: IdentityVerifier;
  directory: SqliteMembershipDirectory;
  membership: MembershipDirectory;
  profiles: ProfileDirectory;
  conversations: ConversationStore;
  messages: MessageStore;
  chat: ChatService;
  typing: TypingService;
  inbox: InboxStore;
  notifications: NotificationService;
  subscriber: NotificationSubscriber;
  close(): Promise<void>;
}

export interface ContextOverrides {
  now?: () => number;
  identity?: IdentityVerifier;
  membership?: MembershipDirectory;
  bus?: NotificationBus;
  typingStore?: TypingStore;
}

function connectRedis(url: string, role: string): Redis {
  const redis = new Redis(url, { lazyConnect: true, maxRetriesPerRequest: 2 });
  redis.on("error", (err: Error) => {
    console.warn(`[redis] ${role} connection error:`, err.message);
  });
  return redis;
}

export function createContext(config: ServerConfig, db: Db, overrides: ContextOverrides = {}): ServerContext {
  const now = overrides.now ?? Date.now;

  const typingStore =
    overrides.typingStore ??
    (config.redisUrl ? new RedisTypingStore(connectRedis(config.redisUrl, "typing")) : new MemoryTypingStore(now));
  const bus =
    overrides.bus ??
    (config.redisUrl ? new RedisNotificationBus(connectRedis(config.redisUrl, "bus")) : new LocalNotificationBus());

  const hub = new ConnectionHub(config.instanceId);
  const heartbeat = new Heartbeat(config.heartbeatIntervalMs);
  const directory = new SqliteMembershipDirectory(db);
  const membership = overrides.membership ?? directory;
  const profiles = new ProfileDirectory(db);
  const conversations = new ConversationStore(db);
  const messages = new MessageStore(db);
  const inbox = new InboxStore(db, now);
  const notifications = new NotificationService(inbox, new NotificationPublisher(bus), directory);

  const subscriber = new NotificationSubscriber(bus, hub);

  const chat = new ChatService(messages, conversations, membership, profiles, hub, notifications, {
    editWindowMs: config.editWindowMs,
    now,
  });

  return {
    config,
    db,
    hub,
    heartbeat,
    identity: overrides.identity ?? new JwtIdentityVerifier(config.jwtSecret),
    directory,
    membership,
    profiles,
    conversations,
    messages,
    chat,
    typing: new TypingService(hub, typingStore, config.typingTtlMs, now),
    inbox,
    notifications,
    subscriber,
    async close() {
      heartbeat.stop();
      hub.closeAll(1001, "Server shutting down");
      await subscriber.stop();
      await bus.close();
      await typingStore.close();
    },
  };
}
