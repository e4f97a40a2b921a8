import type {
  BatchResult, BatchStatus, EntityStatus, ProfileRecord, ReviewRecord,
} from '../types/index.js';

export interface BusinessReviews {
  business_name: string;
  status: EntityStatus;
  error: string | null;
  reviews: ReviewRecord[];
}

export interface CompanyProfiles {
  company_name: string;
  status: EntityStatus;
  error: string | null;
  profiles: ProfileRecord[];
}

export interface ReviewsResponse {
  status: BatchStatus;
  data: BusinessReviews[];
  error: string | null;
}

export interface ProfilesResponse {
  status: BatchStatus;
  data: CompanyProfiles[];
  error: string | null;
}

export function toReviewsResponse(batch: BatchResult<ReviewRecord>): ReviewsResponse {
  return {
    status: batch.status,
    data: batch.data.map(entity => ({
      business_name: entity.entity_identifier,
      status: entity.status,
      error: entity.error_detail,
      reviews: entity.records,
    })),
    error: batch.error,
  };
}

export function toProfilesResponse(batch: BatchResult<ProfileRecord>): ProfilesResponse {
  return {
    status: batch.status,
    data: batch.data.map(entity => ({
      company_name: entity.entity_identifier,
      status: entity.status,
      error: entity.error_detail,
      profiles: entity.records,
    })),
    error: batch.error,
  };
}
