export interface OwnerResponse {
  text: string;
  date: string;
}

export interface ReviewRecord {
  author: string;
  rating: string;
  text: string;
  date: string;
  owner_response: OwnerResponse | null;
}

export interface ProfileRecord {
  name: string;
  subtitle: string | null;
  profile_url: string;
  location: string | null;
  about: string | null;
  latest_job_title: string | null;
  latest_job_company: string | null;
}

export type EntityStatus = 'success' | 'partial_failure' | 'failure';
export type BatchStatus = 'success' | 'partial' | 'failure';
export type EntityPhase = 'pending' | 'resolving' | 'loading' | 'extracting' | 'done' | 'failed';

export interface EntityResult<R> {
  entity_identifier: string;
  records: R[];
  status: EntityStatus;
  error_detail: string | null;
}

export interface BatchResult<R> {
  status: BatchStatus;
  data: EntityResult<R>[];
  error: string | null;
}

export interface Credentials {
  email: string;
  password: string;
}

export type ScrapeKind = 'reviews' | 'profiles';
export type BrowserBackend = 'playwright' | 'remote';
