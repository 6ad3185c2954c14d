/**
 * Site Map Module - Domain Types
 */

/** Filter value that keeps every mineral */
export const ALL_MINERALS = 'All';

export const DEFAULT_ZOOM = 3;

/** Qualitative palette; minerals take colours in encounter order, wrapping */
export const MINERAL_PALETTE = [
  '#636EFA',
  '#EF553B',
  '#00CC96',
  '#AB63FA',
  '#FFA15A',
  '#19D3F3',
  '#FF6692',
  '#B6E880',
  '#FF97FF',
  '#FECB52',
] as const;

export interface Coordinates {
  readonly latitude: number;
  readonly longitude: number;
}

/** Hover text of a marker */
export interface MarkerLabel {
  readonly siteName: string | null;
  readonly mineralName: string;
  readonly countryName: string;
  /** Whole tonnes with en-US grouping, e.g. `"12,345 t"` */
  readonly production: string;
}

export interface MapMarker extends Coordinates {
  readonly color: string;
  readonly label: MarkerLabel;
}

export interface LegendEntry {
  readonly mineralName: string;
  readonly color: string;
}

export interface MapModel {
  readonly center: Coordinates;
  readonly zoom: number;
  readonly markers: readonly MapMarker[];
  readonly legend: readonly LegendEntry[];
}
