/**
 * Coordination record types
 */

export enum MessageType {
  INFORMATIONAL = 'informational',
  WARNING = 'warning',
  COORDINATION_REQUEST = 'coordination-request',
  OPTIMIZATION_SHARE = 'optimization-share',
}

export enum MessagePriority {
  LOW = 'low',
  MEDIUM = 'medium',
  HIGH = 'high',
  CRITICAL = 'critical',
}

/**
 * One manifest row per principal, written only by that principal
 */
export type ProjectStatus = {
  principal: string;
  versionMarker: string;
  tokensUsedToday: number;
  dailyLimit: number;
  /** 0..1 */
  healthScore: number;
  /** Budget day the usage figure belongs to */
  budgetDay: string;
  lastUpdate: Date;
};

export type CoordinationMessage = {
  messageId: string;
  fromPrincipal: string;
  toPrincipal: string;
  type: MessageType;
  priority: MessagePriority;
  title: string;
  body: string;
  metadata: Record<string, unknown>;
  createdAt: Date;
  expiresAt: Date | null;
  read: boolean;
};
