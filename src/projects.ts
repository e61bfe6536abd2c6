import { nanoid } from 'nanoid';
import type { DeliverySettings, NotificationAccount, Project } from './models';
import type { Store } from './store';

/**
 * Splits comma-joined values, strips a leading "@", drops blanks and
 * duplicates while keeping first-seen order.
 */
export function normalizeHandles(raw: readonly string[]): string[] {
  const seen = new Set<string>();
  const result: string[] = [];
  for (const value of raw) {
    for (const part of value.split(',')) {
      const handle = part.trim().replace(/^@+/, '').trim();
      if (!handle || seen.has(handle)) continue;
      seen.add(handle);
      result.push(handle);
    }
  }
  return result;
}

// active projects, optionally narrowed to one id
export function selectProjects(store: Store, projectId?: string): Promise<Project[]> {
  return store.select('projects', { where: { active: true, id: projectId }, orderBy: 'createdAt' });
}

export async function listHandles(store: Store, projectId: string): Promise<string[]> {
  const rows = await store.select('monitoredAccounts', { where: { projectId } });
  return normalizeHandles(rows.map((row) => row.handle));
}

/** Stores one row per new handle and returns the handles that were added. */
export async function addHandles(store: Store, projectId: string, handles: readonly string[]): Promise<string[]> {
  const known = new Set(await listHandles(store, projectId));
  const added: string[] = [];
  for (const handle of normalizeHandles(handles)) {
    if (known.has(handle)) continue;
    await store.insert('monitoredAccounts', { id: nanoid(), projectId, handle });
    added.push(handle);
  }
  return added;
}

export async function createProject(
  store: Store,
  input: { name: string; ownerId: string; handles?: readonly string[] },
  now = Date.now()
): Promise<Project> {
  const project = await store.insert('projects', {
    id: nanoid(),
    name: input.name,
    ownerId: input.ownerId,
    active: true,
    createdAt: now
  });
  if (input.handles) await addHandles(store, project.id, input.handles);
  return project;
}

export function setProjectActive(store: Store, projectId: string, active: boolean): Promise<number> {
  return store.update('projects', { id: projectId }, { active });
}

export function saveDeliverySettings(
  store: Store,
  settings: Omit<DeliverySettings, 'maxItems'>
): Promise<DeliverySettings> {
  return store.upsert('deliverySettings', { ...settings, maxItems: 1 }, { conflict: ['projectId'] });
}

export function saveNotificationAccount(store: Store, account: NotificationAccount): Promise<NotificationAccount> {
  return store.upsert('notificationAccounts', account, { conflict: ['ownerId'] });
}
