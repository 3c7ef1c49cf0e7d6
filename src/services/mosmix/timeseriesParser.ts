import { XMLParser } from 'fast-xml-parser';
import { ParseError } from '../../errors';
import type {
  ForecastSnapshot,
  StationCoordinates,
  WeatherObservation,
} from '../../types/forecast';

export const REQUIRED_PARAMETERS = ['Rad1h', 'TTT', 'PPPP', 'FF'] as const;
export type RequiredParameter = (typeof REQUIRED_PARAMETERS)[number];

export interface SnapshotSource {
  fetchedAt: Date;
  fingerprint: string;
  sourceUrl: string;
}

export interface ParseOptions {
  /** Placemark name to select; the first placemark is used when omitted. */
  stationId?: string;
}

/** A MOSMIX document reduced to its axis and the value lists of one placemark. */
export interface MosmixDocument {
  issueTime: Date | null;
  timeSteps: Date[];
  stationId: string;
  stationName: string | null;
  coordinates: StationCoordinates | null;
  forecasts: Map<string, string[]>;
}

const ARRAY_TAGS = new Set(['TimeStep', 'Placemark', 'Forecast']);

const xmlParser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '@_',
  removeNSPrefix: true,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: true,
  ignoreDeclaration: true,
  isArray: (tagName) => ARRAY_TAGS.has(tagName),
});

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: unknown, ...path: string[]): unknown {
  let current: unknown = node;
  for (const key of path) {
    if (!isNode(current)) return undefined;
    current = current[key];
  }
  return current;
}

function asArray(value: unknown): unknown[] {
  if (value === undefined || value === null) return [];
  return Array.isArray(value) ? value : [value];
}

function textOf(value: unknown): string | null {
  if (typeof value === 'string') return value;
  if (isNode(value) && typeof value['#text'] === 'string') return value['#text'];
  return null;
}

function parseInstant(text: string | null): Date | null {
  if (!text) return null;
  const parsed = new Date(text.trim());
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

function parseCoordinates(text: string | null): StationCoordinates | null {
  if (!text) return null;
  const [longitude, latitude, altitudeM] = text.split(',').map((part) => Number(part.trim()));
  if (![longitude, latitude, altitudeM].every((n) => Number.isFinite(n))) return null;
  return { longitude, latitude, altitudeM };
}

function readTimeSteps(document: unknown): Date[] {
  const steps = asArray(
    child(document, 'kml', 'Document', 'ExtendedData', 'ProductDefinition', 'ForecastTimeSteps', 'TimeStep'),
  );
  if (steps.length === 0) {
    throw new ParseError('Document has no ForecastTimeSteps axis');
  }

  const timeSteps: Date[] = [];
  steps.forEach((step, index) => {
    const text = textOf(step);
    const instant = parseInstant(text);
    if (!instant) {
      throw new ParseError(`Invalid timestamp at axis position ${index}`, [`value=${text ?? ''}`]);
    }
    const previous = timeSteps[timeSteps.length - 1];
    if (previous && instant.getTime() <= previous.getTime()) {
      throw new ParseError(`Timestamp axis is not strictly increasing at position ${index}`, [
        `${previous.toISOString()} >= ${instant.toISOString()}`,
      ]);
    }
    timeSteps.push(instant);
  });
  return timeSteps;
}

function selectPlacemark(document: unknown, stationId?: string): XmlNode {
  const placemarks = asArray(child(document, 'kml', 'Document', 'Placemark')).filter(isNode);
  if (placemarks.length === 0) {
    throw new ParseError('Document has no forecast Placemark');
  }
  if (!stationId) return placemarks[0];

  const match = placemarks.find((p) => textOf(p.name)?.trim() === stationId);
  if (!match) {
    throw new ParseError(`Document has no Placemark for station ${stationId}`, [
      `found=${placemarks.map((p) => textOf(p.name) ?? '?').join(',')}`,
    ]);
  }
  return match;
}

function readForecasts(placemark: XmlNode): Map<string, string[]> {
  const forecasts = new Map<string, string[]>();
  for (const forecast of asArray(child(placemark, 'ExtendedData', 'Forecast'))) {
    if (!isNode(forecast)) continue;
    const code = forecast['@_elementName'];
    if (typeof code !== 'string') continue;
    const values = textOf(forecast.value) ?? '';
    forecasts.set(code, values.split(/\s+/).filter((token) => token.length > 0));
  }
  return forecasts;
}

/**
 * Reads the XML structure of a MOSMIX KML document without interpreting any
 * parameter values.
 */
export function readMosmixDocument(raw: string, options: ParseOptions = {}): MosmixDocument {
  let document: unknown;
  try {
    document = xmlParser.parse(raw, true);
  } catch (err) {
    throw new ParseError(`Document is not well-formed XML: ${err instanceof Error ? err.message : String(err)}`);
  }

  const timeSteps = readTimeSteps(document);
  const placemark = selectPlacemark(document, options.stationId);

  return {
    issueTime: parseInstant(
      textOf(child(document, 'kml', 'Document', 'ExtendedData', 'ProductDefinition', 'IssueTime')),
    ),
    timeSteps,
    stationId: textOf(placemark.name)?.trim() ?? options.stationId ?? '',
    stationName: textOf(placemark.description)?.trim() ?? null,
    coordinates: parseCoordinates(textOf(child(placemark, 'Point', 'coordinates'))),
    forecasts: readForecasts(placemark),
  };
}

function parseToken(token: string): number | null {
  // DWD marks missing values with "-"; anything non-numeric is treated the same way.
  if (!/^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/.test(token)) return null;
  const value = Number(token);
  return Number.isFinite(value) ? value : null;
}

/**
 * Returns each requested parameter as a list aligned to the time axis, with
 * `null` for missing slots.
 */
export function extractParameterSeries<C extends string>(
  document: MosmixDocument,
  codes: readonly C[],
): Map<C, (number | null)[]> {
  const missing = codes.filter((code) => !document.forecasts.has(code));
  if (missing.length > 0) {
    throw new ParseError(`Document is missing required parameters: ${missing.join(', ')}`);
  }

  const series = new Map<C, (number | null)[]>();
  for (const code of codes) {
    const tokens = document.forecasts.get(code) ?? [];
    if (tokens.length !== document.timeSteps.length) {
      throw new ParseError(
        `Parameter ${code} has ${tokens.length} values for ${document.timeSteps.length} timestamps`,
      );
    }
    series.set(code, tokens.map(parseToken));
  }
  return series;
}

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

/** kJ/m² → Wh/m² */
export function kilojoulesToWattHours(value: number): number {
  return round(value / 3.6, 3);
}

export function kelvinToCelsius(value: number): number {
  return round(value - 273.15, 2);
}

export function pascalToHectopascal(value: number): number {
  return round(value / 100, 2);
}

/**
 * Parses a MOSMIX KML document into a frozen snapshot. Timestamps with a
 * missing or non-numeric value in any required parameter are left out.
 */
export function parseForecastDocument(
  raw: string,
  source: SnapshotSource,
  options: ParseOptions = {},
): ForecastSnapshot {
  const document = readMosmixDocument(raw, options);
  const series = extractParameterSeries(document, REQUIRED_PARAMETERS);
  const column = (code: RequiredParameter) => series.get(code) ?? [];
  const [rad1hValues, tttValues, ppppValues, ffValues] = REQUIRED_PARAMETERS.map(column);

  const observations: Readonly<WeatherObservation>[] = [];
  document.timeSteps.forEach((timestamp, index) => {
    const rad1h = rad1hValues[index] ?? null;
    const ttt = tttValues[index] ?? null;
    const pppp = ppppValues[index] ?? null;
    const ff = ffValues[index] ?? null;
    if (rad1h === null || ttt === null || pppp === null || ff === null) return;

    observations.push(
      Object.freeze({
        timestamp,
        irradianceHourly: kilojoulesToWattHours(rad1h),
        pressure: pascalToHectopascal(pppp),
        windSpeed: ff,
        temperature: kelvinToCelsius(ttt),
      }),
    );
  });

  return Object.freeze({
    observations: Object.freeze(observations),
    fetchedAt: source.fetchedAt,
    fingerprint: source.fingerprint,
    sourceUrl: source.sourceUrl,
    issueTime: document.issueTime,
    stationId: document.stationId,
    stationName: document.stationName,
    coordinates: document.coordinates,
    axisLength: document.timeSteps.length,
    excludedCount: document.timeSteps.length - observations.length,
  });
}
