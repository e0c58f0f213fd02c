import type { DisplaySink, NotificationItem } from "../types.js";

/**
 * Display sink for desks and SSH sessions: one line per notification
 */
export class ConsoleDisplaySink implements DisplaySink {
  constructor(private readonly write: (line: string) => void = (line) => console.log(line)) {}

  render(item: NotificationItem): void {
    this.write(formatNotification(item));
  }
}

export function formatNotification(item: NotificationItem): string {
  return `[${item.priority.toUpperCase()}] ${item.text}`;
}
