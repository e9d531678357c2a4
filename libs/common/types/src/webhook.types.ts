/**
 * Fakehook Webhook Types
 * Dispatch results and webhook.site API shapes
 */

import { Person } from './person.types';

export interface DispatchResult {
  url: string;
  status_code: number;
  records_sent: number;
  bytes_sent: number;
  duration_ms: number;
  attempts: number;
}

export interface WebhookToken {
  uuid: string;
  url: string;
  created_at: string;
}

export type RequestSorting = 'newest' | 'oldest';

export interface CapturedRequest {
  uuid: string;
  method: string;
  url: string;
  content: string;
  headers: Record<string, string[]>;
  created_at: string;
  json: unknown | null;
}

export interface CapturedRequestPage {
  total: number;
  page: number;
  is_last_page: boolean;
  requests: CapturedRequest[];
}

export interface CapturedPeople {
  request_uuid: string;
  received_at: string;
  people: Person[];
}
