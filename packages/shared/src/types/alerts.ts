export type AlertStatus = 'normal' | 'alerted';

export type AlertEventType = 'raised' | 'cleared';

export interface AlertEvent {
  type: AlertEventType;
  quantity: string;
  value: number;
  threshold: number;
  timestamp: Date;
}

export interface AlertState {
  quantity: string;
  status: AlertStatus;
  enter: number;
  clear: number;
  since: Date | null;
}
