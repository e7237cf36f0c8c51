import {
  EVENT_CATEGORY_LABELS,
  EVENT_FORMAT_LABELS,
} from '@event-pulse/contract';
import type { Event } from '../drizzle/schema';

/** Events carry no end time; calendar entries assume this length */
export const DEFAULT_EVENT_DURATION_MS = 2 * 60 * 60 * 1000;

type CalendarEvent = Pick<
  Event,
  | 'title'
  | 'startsAt'
  | 'location'
  | 'description'
  | 'category'
  | 'format'
  | 'organizerContact'
>;

function calendarDetails(event: CalendarEvent): string {
  const parts: string[] = [];
  if (event.description) parts.push(event.description);
  parts.push(`Category: ${EVENT_CATEGORY_LABELS[event.category]}`);
  parts.push(`Format: ${EVENT_FORMAT_LABELS[event.format]}`);
  parts.push(`Organizer: ${event.organizerContact}`);
  return parts.join('\n');
}

/** 2026-03-10T18:00:00.000Z -> 20260310T180000Z */
function toGoogleDate(date: Date): string {
  return date
    .toISOString()
    .replace(/\.\d{3}/, '')
    .replace(/[-:]/g, '');
}

/** 2026-03-10T18:00:00.000Z -> 2026-03-10T18:00:00Z */
function toIsoSeconds(date: Date): string {
  return date.toISOString().replace(/\.\d{3}/, '');
}

/** "Add to Google Calendar" template link */
export function googleCalendarUrl(event: CalendarEvent): string {
  const end = new Date(event.startsAt.getTime() + DEFAULT_EVENT_DURATION_MS);
  const params = [
    'action=TEMPLATE',
    `text=${encodeURIComponent(event.title)}`,
    `dates=${toGoogleDate(event.startsAt)}/${toGoogleDate(end)}`,
    `location=${encodeURIComponent(event.location)}`,
    `details=${encodeURIComponent(calendarDetails(event))}`,
  ];
  return `https://calendar.google.com/calendar/render?${params.join('&')}`;
}

/** "Add to Yandex Calendar" link */
export function yandexCalendarUrl(event: CalendarEvent): string {
  const end = new Date(event.startsAt.getTime() + DEFAULT_EVENT_DURATION_MS);
  const params = [
    `startTs=${encodeURIComponent(toIsoSeconds(event.startsAt))}`,
    `endTs=${encodeURIComponent(toIsoSeconds(end))}`,
    `name=${encodeURIComponent(event.title)}`,
    `where=${encodeURIComponent(event.location)}`,
    `description=${encodeURIComponent(calendarDetails(event))}`,
  ];
  return `https://calendar.yandex.ru/event?${params.join('&')}`;
}
