/**
 * One (work, external institution, country) collaboration.
 */
export interface CollaborationRecord {
    partner: string | null;
    dataset_id: string | null;
    title: string | null;
    year: number | null;
}

/**
 * Per-country bucket built by the aggregator.
 */
export interface CountryAggregate {
    country_code: string;
    collaborations: CollaborationRecord[];
}

export interface DatasetRecord {
    dataset_id: string;
    title: string | null;
    year: number | null;
}

export interface CountryInfo {
    name: string;
    latitude: number;
    longitude: number;
    /** [lat, lng], the order map libraries such as Leaflet expect */
    coords: [number, number];
}

export type CountryTable = Map<string, CountryInfo>;

/**
 * Short institution id → country code. An empty string records a successful
 * lookup that carried no code.
 */
export type CountryCache = Map<string, string>;

export interface CollaborationReportEntry {
    country_code: string;
    collaborations_count: number;
    collaborations: CollaborationRecord[];
    country: CountryInfo;
}
