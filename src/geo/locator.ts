import { lookup } from 'dns/promises';
import { open, type CityResponse } from 'maxmind';
import type { GeoInfo, GeoLookup } from '../types/index.js';

interface LocalizedNames {
  en?: string;
}

/** The parts of a City database record the locator reads. */
export interface CityRecord {
  country?: { iso_code?: string; names?: LocalizedNames };
  city?: { names?: LocalizedNames };
  location?: { latitude?: number; longitude?: number };
}

export interface CityDatabase {
  get(ip: string): CityRecord | null;
}

export type AddressResolver = (domain: string) => Promise<string>;

async function resolveAddress(domain: string): Promise<string> {
  const { address } = await lookup(domain);
  return address;
}

/** Locates instances in a local MaxMind City database. */
export class GeoLocator implements GeoLookup {
  private readonly database: CityDatabase;
  private readonly resolve: AddressResolver;

  constructor(database: CityDatabase, resolve: AddressResolver = resolveAddress) {
    this.database = database;
    this.resolve = resolve;
  }

  static async open(databasePath: string): Promise<GeoLocator> {
    const reader = await open<CityResponse>(databasePath);
    return new GeoLocator(reader);
  }

  async locate(domain: string): Promise<GeoInfo | null> {
    const ip = await this.resolve(domain);
    const record = this.database.get(ip);
    if (!record) return null;

    return {
      ip,
      countryCode: record.country?.iso_code ?? null,
      countryName: record.country?.names?.en ?? null,
      city: record.city?.names?.en ?? null,
      latitude: record.location?.latitude ?? null,
      longitude: record.location?.longitude ?? null,
    };
  }
}
