/**
 * Site Map Module - Public API
 */

export {
  ALL_MINERALS,
  DEFAULT_ZOOM,
  MINERAL_PALETTE,
  type Coordinates,
  type MarkerLabel,
  type MapMarker,
  type LegendEntry,
  type MapModel,
} from './core/types.js';

export { buildMapModel, assignColors, formatTonnes } from './core/map-model.js';

export { makeSiteMapRoutes, type MakeSiteMapRoutesDeps } from './shell/rest/routes.js';

export {
  MapQuerySchema,
  MapModelSchema,
  NullableMapModelSchema,
  MapResponseSchema,
  type MapQuery,
} from './shell/rest/schemas.js';
