import { NtfySettings } from '../interfaces';
import { errorMessage } from './errors';

export type NotificationPriority = 'min' | 'low' | 'default' | 'high' | 'urgent';

export interface Notification {
  title: string;
  message: string;
  priority: NotificationPriority;
  tags: Array<string>;
}

export type NotificationOutcome = { delivered: true } | { delivered: false; error: string };

export type Notifier = (notification: Notification) => Promise<NotificationOutcome>;

export const NTFY_TIMEOUT_MS = 10_000;

/**
 * Publish one message to an ntfy topic
 *
 * Single attempt with a 10 second timeout. A non-2xx answer or a transport
 * error is logged and returned as an undelivered outcome; this never throws.
 *
 * @param settings ntfy server, topic and optional bearer token
 * @param fetchImpl Injected for tests; defaults to the global fetch
 */
export async function sendNotification(
  settings: NtfySettings,
  notification: Notification,
  fetchImpl: typeof fetch = fetch
): Promise<NotificationOutcome> {
  const url = `${settings.server}/${encodeURIComponent(settings.topic)}`;
  const headers: Record<string, string> = {
    Title: notification.title,
    Priority: notification.priority,
    Tags: notification.tags.join(','),
  };
  if (settings.token) {
    headers.Authorization = `Bearer ${settings.token}`;
  }

  try {
    const response = await fetchImpl(url, {
      method: 'POST',
      headers,
      body: notification.message,
      signal: AbortSignal.timeout(NTFY_TIMEOUT_MS),
    });
    if (!response.ok) {
      const error = `ntfy responded with HTTP ${response.status}`;
      console.error(`Failed to send ntfy notification "${notification.title}": ${error}`);
      return { delivered: false, error };
    }
    console.log(`Sent ntfy notification "${notification.title}" to ${url}`);
    return { delivered: true };
  } catch (error) {
    console.error(`Failed to send ntfy notification "${notification.title}":`, error);
    return { delivered: false, error: errorMessage(error) };
  }
}

/**
 * Bind {@link sendNotification} to a fixed target
 */
export function createNtfyNotifier(settings: NtfySettings, fetchImpl: typeof fetch = fetch): Notifier {
  return (notification) => sendNotification(settings, notification, fetchImpl);
}
