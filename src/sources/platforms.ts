import type { Platform } from '../types/job';

/**
 * Per-platform quirks consumed by the search adapter
 */
export interface PlatformCapabilities {
  /** Platform rejects city-level locations; the country is sent instead */
  requiresCountryLocation: boolean;
  /** Platform reliably returns job descriptions */
  descriptionsSupported: boolean;
}

export const PLATFORM_CAPABILITIES: Readonly<Record<Platform, PlatformCapabilities>> = {
  indeed: { requiresCountryLocation: false, descriptionsSupported: true },
  glassdoor: { requiresCountryLocation: true, descriptionsSupported: false },
  linkedin: { requiresCountryLocation: false, descriptionsSupported: true },
  zip_recruiter: { requiresCountryLocation: false, descriptionsSupported: true },
  google: { requiresCountryLocation: false, descriptionsSupported: true },
  bayt: { requiresCountryLocation: false, descriptionsSupported: false },
  naukri: { requiresCountryLocation: false, descriptionsSupported: true },
};
