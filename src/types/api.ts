import { AnalysisResult, BusinessModel, Platform } from './analysis.js';
import { DashboardView } from '../services/dashboard.js';
import { ProviderId } from '../services/providers/types.js';

// Health check
export interface HealthCheckResponse {
  status: 'ok';
  timestamp: string;
  providers: ProviderId[];
}

// Analysis
export interface AnalysisOptionsResponse {
  providers: Array<{ id: ProviderId; label: string; model: string }>;
  businessModels: Array<{ id: BusinessModel; label: string }>;
  platforms: Array<{ id: Platform; label: string }>;
}

export interface AnalysisRequest {
  product?: unknown;
  provider?: string;
  credential?: string;
}

export interface AnalysisResponse {
  provider: {
    id: ProviderId;
    label: string;
    model: string;
    fallback: boolean;
  };
  result: AnalysisResult;
  dashboard: DashboardView;
}

// Catalog
export interface CatalogConnectionRequest {
  shop?: string;
  accessToken?: string;
}

export interface CatalogAnalysisRequest {
  businessModel?: unknown;
  platform?: unknown;
  cost?: unknown;
  provider?: string;
  credential?: string;
}
