export interface CriticalAlert {
  title: string;
  message: string;
  platform?: string;
}

/** Implementations must never reject. */
export interface AlertNotifierPort {
  sendCriticalAlert(alert: CriticalAlert): Promise<void>;
}
