export type Notification = {
  subject: string;
  body: string;
};

export interface Notifier {
  notify(notification: Notification): Promise<void>;
}
