import proj4 from "proj4";

export type LatLon = { lat: number; lon: number };

/** Source-CRS coordinates (easting, northing) to WGS84 */
export type Projector = (x: number, y: number) => LatLon;

export type ProjectionKind = "proj4" | "linear";

// British National Grid, EPSG:27700, with the OSGB36 -> WGS84 shift
export const BRITISH_NATIONAL_GRID =
  "+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy " +
  "+towgs84=446.448,-125.157,542.06,0.15,0.247,0.842,-20.489 +units=m +no_defs";

const WGS84 = "EPSG:4326";
const BNG_CODE = "EPSG:27700";

// False origin of the grid and rough metres-per-degree for UK latitudes
const FALSE_EASTING = 400000;
const FALSE_NORTHING = -100000;
const ORIGIN_LAT = 49;
const ORIGIN_LON = -2;
const METERS_PER_DEGREE_LAT = 111320;
const METERS_PER_DEGREE_LON = METERS_PER_DEGREE_LAT * 0.68;

export function createProj4Projector(): Projector {
  proj4.defs(BNG_CODE, BRITISH_NATIONAL_GRID);
  return (x, y) => {
    const [lon, lat] = proj4(BNG_CODE, WGS84, [x, y]);
    return { lat, lon };
  };
}

/**
 * Flat approximation around the grid's false origin. Longitudes drift by
 * kilometres away from the central meridian.
 */
export const linearBngProjector: Projector = (easting, northing) => ({
  lat: ORIGIN_LAT + (northing - FALSE_NORTHING) / METERS_PER_DEGREE_LAT,
  lon: ORIGIN_LON + (easting - FALSE_EASTING) / METERS_PER_DEGREE_LON
});

export function createProjector(kind: ProjectionKind): Projector {
  return kind === "proj4" ? createProj4Projector() : linearBngProjector;
}
