import { toNotificationEvent, type InboxEvent, type InboxItem } from "@teamline/protocol";
import { NotFoundError } from "../errors.js";
import type { InboxStore, NewInboxItem } from "./inbox-store.js";
import type { NotificationPublisher } from "./publisher.js";

/** Who to tell when a task in a project completes */
export interface ProjectRoster {
  projectMemberIds(projectId: string): string[];
}

export interface TaskNotice {
  orgId: string;
  taskId: string;
  taskTitle: string;
  projectName: string;
  actorId: string;
  actorName: string;
}

const PREVIEW_LENGTH = 100;

/**
 * Producer side of the inbox: persists items and publishes the matching
 * events on the bus. Safe to use from any process; delivery to sockets is
 * the subscriber's job.
 */
export class NotificationService {
  constructor(
    private readonly store: InboxStore,
    private readonly publisher: NotificationPublisher,
    private readonly roster: ProjectRoster
  ) {}

  async notify(input: NewInboxItem): Promise<InboxItem> {
    const item = this.store.create(input);
    const unreadCount = this.store.unreadCount(item.user_id, item.org_id);
    console.log(`[bridge] Inbox item ${item.id} (${item.event_type}) for ${item.user_id}`);

    await this.emit(item.user_id, item.org_id, { type: "inbox_new", data: item, unread_count: unreadCount });
    return item;
  }

  async markRead(userId: string, orgId: string, inboxId: string): Promise<InboxItem> {
    this.requireItem(userId, orgId, inboxId);
    this.store.markRead(inboxId, userId);
    await this.emitWithCount(userId, orgId, { type: "inbox_read", inbox_id: inboxId });
    return this.requireItem(userId, orgId, inboxId);
  }

  async archive(userId: string, orgId: string, inboxId: string): Promise<InboxItem> {
    this.requireItem(userId, orgId, inboxId);
    this.store.setArchived(inboxId, userId, true);
    await this.emitWithCount(userId, orgId, { type: "inbox_archived", inbox_id: inboxId });
    return this.requireItem(userId, orgId, inboxId);
  }

  async unarchive(userId: string, orgId: string, inboxId: string): Promise<InboxItem> {
    this.requireItem(userId, orgId, inboxId);
    this.store.setArchived(inboxId, userId, false);
    await this.emitWithCount(userId, orgId, { type: "unread_count", count: this.store.unreadCount(userId, orgId) });
    return this.requireItem(userId, orgId, inboxId);
  }

  async remove(userId: string, orgId: string, inboxId: string): Promise<void> {
    this.requireItem(userId, orgId, inboxId);
    this.store.remove(inboxId, userId);
    await this.emitWithCount(userId, orgId, { type: "inbox_deleted", inbox_id: inboxId });
  }

  notifyOrganizationInvitation(input: {
    userId: string;
    orgId: string;
    orgName: string;
    inviterId: string;
    inviterName: string;
  }): Promise<InboxItem> {
    return this.notify({
      userId: input.userId,
      orgId: input.orgId,
      userBy: input.inviterId,
      title: `Invitation to ${input.orgName}`,
      message: `${input.inviterName} has invited you to join ${input.orgName}`,
      eventType: "organization_invitation",
      referenceId: input.orgId,
    });
  }

  notifyTaskAssigned(userId: string, task: TaskNotice): Promise<InboxItem> {
    return this.notify({
      userId,
      orgId: task.orgId,
      userBy: task.actorId,
      title: `Task Assigned: ${task.taskTitle}`,
      message: `${task.actorName} assigned you a task '${task.taskTitle}' in project ${task.projectName}`,
      eventType: "task_assigned",
      referenceId: task.taskId,
    });
  }

  notifyTaskUnassigned(userId: string, task: TaskNotice): Promise<InboxItem> {
    return this.notify({
      userId,
      orgId: task.orgId,
      userBy: task.actorId,
      title: `Task Unassigned: ${task.taskTitle}`,
      message: `${task.actorName} unassigned you from task '${task.taskTitle}' in project ${task.projectName}`,
      eventType: "task_unassigned",
      referenceId: task.taskId,
    });
  }

  /** Every project member except whoever completed the task */
  async notifyTaskCompleted(projectId: string, task: TaskNotice): Promise<InboxItem[]> {
    const recipients = this.roster.projectMemberIds(projectId).filter((id) => id !== task.actorId);
    if (recipients.length === 0) {
      console.warn(`[bridge] No project members to notify for project ${projectId}`);
      return [];
    }

    const items: InboxItem[] = [];
    for (const userId of recipients) {
      items.push(
        await this.notify({
          userId,
          orgId: task.orgId,
          userBy: task.actorId,
          title: `Task Completed: ${task.taskTitle}`,
          message: `${task.actorName} completed task '${task.taskTitle}' in project ${task.projectName}`,
          eventType: "task_completed",
          referenceId: task.taskId,
        })
      );
    }
    return items;
  }

  notifyDirectMessage(input: {
    userId: string;
    orgId: string;
    senderId: string;
    senderName: string;
    preview: string;
    conversationId: string;
  }): Promise<InboxItem> {
    return this.notify({
      userId: input.userId,
      orgId: input.orgId,
      userBy: input.senderId,
      title: `New message from ${input.senderName}`,
      message: `${input.senderName}: ${input.preview.slice(0, PREVIEW_LENGTH)}`,
      eventType: "direct_message",
      referenceId: input.conversationId,
    });
  }

  private requireItem(userId: string, orgId: string, inboxId: string): InboxItem {
    const item = this.store.get(inboxId, userId);
    if (!item || item.org_id !== orgId) throw new NotFoundError("Inbox item not found");
    return item;
  }

  private async emitWithCount(userId: string, orgId: string, event: InboxEvent): Promise<void> {
    await this.emit(userId, orgId, event);
    if (event.type !== "unread_count") {
      await this.emit(userId, orgId, { type: "unread_count", count: this.store.unreadCount(userId, orgId) });
    }
  }

  private async emit(userId: string, orgId: string, event: InboxEvent): Promise<void> {
    await this.publisher.publish(toNotificationEvent(userId, orgId, event));
  }
}
