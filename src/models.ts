export type Trend = 'PEAK' | 'RISING' | 'DYING' | 'STABLE';

export interface Project {
  id: string;
  name: string;
  ownerId: string;
  active: boolean;
  createdAt: number; // epoch ms
}

// one row per project/handle pair; older rows may still hold "a,b,@c"
export interface MonitoredAccount {
  id: string;
  projectId: string;
  handle: string;
}

export interface Reel {
  projectId: string;
  url: string;
  views: number;
  likes: number;
  comments: number;
  lastSeenAt: number;
  missingCount: number;
  isRecommended: boolean;
  score: number | null;
  trend: Trend | null;
  analyzedAt: number | null;
}

export interface ReelSnapshot {
  id: string;
  projectId: string;
  url: string;
  views: number;
  likes: number;
  comments: number;
  caption: string;
  capturedAt: number;
}

export interface SentReel {
  id: string;
  projectId: string;
  url: string;
  sentAt: number;
}

export interface DeliverySettings {
  projectId: string;
  sendHour: number; // 0-23, project local time
  timezone: string; // IANA name
  maxItems: number;
}

export interface NotificationAccount {
  ownerId: string;
  destination: string; // chat id on the notification channel
}

// what the content source reports for one reel
export interface ReelItem {
  url: string;
  views: number;
  likes: number;
  comments: number;
  caption: string;
}

export interface Tables {
  projects: Project;
  monitoredAccounts: MonitoredAccount;
  reels: Reel;
  reelSnapshots: ReelSnapshot;
  sentReels: SentReel;
  deliverySettings: DeliverySettings;
  notificationAccounts: NotificationAccount;
}

export type DBSchema = { [K in keyof Tables]: Tables[K][] };
