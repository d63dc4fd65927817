// src/core/users/types.ts

import type { InteractionType } from '../../config/ConfigValidator';
import type { USER_PROFILE_FIELDS } from '../tables/codecs';

export interface UserInteractionRecord {
  login: string;
  repository: string; // owner/name
  interactionType: InteractionType;
  timestamp: string; // ISO 8601, empty when the API gives none
}

export type UserProfileField = (typeof USER_PROFILE_FIELDS)[number];

export type UserProfile = Record<UserProfileField, string>;

export interface UserDetailRecord {
  login: string;
  profile: UserProfile;
  // Derived by the classify stage; empty until then
  organisation: string;
  country: string;
  category: string;
  ruleId: string;
}

export const UNCLASSIFIED = 'unclassified';
