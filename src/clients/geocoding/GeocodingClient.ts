// src/clients/geocoding/GeocodingClient.ts

import { z } from 'zod';
import type { HttpCore } from '../../core/http/HttpCore';

export const NOMINATIM_URL = 'https://nominatim.openstreetmap.org';

const PlaceSchema = z.object({
  display_name: z.string().nullish(),
  address: z.object({ country: z.string().nullish() }).passthrough().nullish(),
});

/**
 * Free-text place search against a Nominatim instance. Requests go through
 * the `geocoder` rate limit partition.
 */
export class GeocodingClient {
  constructor(
    private http: HttpCore,
    private baseUrl: string = NOMINATIM_URL
  ) {}

  /**
   * @returns the English country name of the best match, or undefined when
   * nothing matches
   */
  async country(location: string, signal?: AbortSignal): Promise<string | undefined> {
    const response = await this.http.get(`${this.baseUrl.replace(/\/+$/, '')}/search`, {
      provider: 'geocoder',
      query: {
        q: location,
        format: 'jsonv2',
        addressdetails: 1,
        limit: 1,
        'accept-language': 'en',
      },
      signal,
    });

    const [place] = z.array(PlaceSchema).parse(response.data);
    if (!place) return undefined;

    const country = place.address?.country?.trim();
    if (country) return country;

    // Without address details the country is the last display name part
    const parts = (place.display_name ?? '').split(',');
    const last = parts[parts.length - 1]?.trim();
    return last ? last : undefined;
  }
}
