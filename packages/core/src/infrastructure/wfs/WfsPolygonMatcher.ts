import { parseStringPromise } from 'xml2js';
import type { Coordinates } from '../../domain/model/Coordinates.js';
import type { PolygonMatcher } from '../../domain/ports/PolygonMatcher.js';
import { PIPError, errorMessage } from '../../domain/errors.js';
import { DEFAULT_TIMEOUT_MS, fetchWithTimeout } from '../http/fetchWithTimeout.js';
import type { TextResponse } from '../http/fetchWithTimeout.js';

export interface WfsPolygonMatcherOptions {
  /** WFS service endpoint, e.g. `http://example.org/geoserver/ows`. */
  readonly endpoint: string;
  /** Qualified name of the polygon layer, e.g. `ahgf_shcatch:AHGFCatchment`. */
  readonly layer: string;
  /** Geometry attribute the spatial filter applies to. */
  readonly geometryField: string;
  /** Qualified name of the attribute returned as the polygon identifier, e.g. `ahgf_shcatch:hydroid`. */
  readonly identifierField: string;
  /** Namespace of the layer and identifier prefixes. */
  readonly namespace: { readonly prefix: string; readonly url: string };
  /** Spatial reference of the query point. Default: `EPSG:4283`. */
  readonly srsName?: string;
  /** Request timeout in milliseconds. Default: `30000`. */
  readonly timeoutMs?: number;
}

const OGC_NS = 'http://www.opengis.net/ogc';
const GML_NS = 'http://www.opengis.net/gml';
const WFS_NS = 'http://www.opengis.net/wfs';

/** Element name resolved against its namespace. `uri` is absent for unprefixed names. */
interface ElementName {
  readonly uri?: string;
  readonly local: string;
}

type XmlNode = Record<string, unknown>;

function isNode(value: unknown): value is XmlNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isElement(node: XmlNode, name: ElementName): boolean {
  const ns = node['$ns'];
  if (!isNode(ns)) return false;
  return ns['local'] === name.local && (name.uri === undefined || ns['uri'] === name.uri);
}

/** Child elements of `node` named `name`, in document order. */
function childElements(node: XmlNode, name: ElementName): XmlNode[] {
  const found: XmlNode[] = [];
  for (const [key, value] of Object.entries(node)) {
    if (key === '$' || key === '$ns' || key === '_' || !Array.isArray(value)) continue;
    for (const child of value) {
      if (isNode(child) && isElement(child, name)) found.push(child);
    }
  }
  return found;
}

function textOf(node: XmlNode): string {
  const text = node['_'];
  return typeof text === 'string' ? text.trim() : '';
}

/**
 * Point-in-polygon lookup against an OGC Web Feature Service.
 *
 * Sends a `GetFeature` request whose filter applies the given spatial predicate
 * between the layer geometry and the point, asking only for the identifier
 * attribute. When several features come back, the identifier of the last one
 * in the response wins; none yields `null`.
 */
export class WfsPolygonMatcher implements PolygonMatcher {
  private readonly options: WfsPolygonMatcherOptions;
  private readonly layerName: ElementName;
  private readonly identifierName: ElementName;
  private readonly srsName: string;
  private readonly timeoutMs: number;

  constructor(options: WfsPolygonMatcherOptions) {
    this.options = options;
    this.layerName = this.resolveName(options.layer);
    this.identifierName = this.resolveName(options.identifierField);
    this.srsName = options.srsName ?? 'EPSG:4283';
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  async matchPolygon(point: Coordinates, predicate: string): Promise<string | null> {
    const url = this.buildRequestUrl(point, predicate);

    let response: TextResponse;
    try {
      response = await fetchWithTimeout(url, {}, this.timeoutMs);
    } catch (error) {
      throw new PIPError(`request failed: ${errorMessage(error)}`, { url }, { cause: error });
    }

    if (!response.ok) {
      throw new PIPError(`HTTP ${String(response.status)}`, { url });
    }

    return this.readIdentifier(response.body);
  }

  /** Build the `GetFeature` URL for a point. The predicate is used as the filter element name verbatim. */
  buildRequestUrl(point: Coordinates, predicate: string): string {
    const filter =
      `<Filter xmlns="${OGC_NS}" xmlns:gml="${GML_NS}">` +
      `<${predicate}>` +
      `<PropertyName>${this.options.geometryField}</PropertyName>` +
      `<gml:Point srsName="${this.srsName}">` +
      `<gml:coordinates>${point.longitude},${point.latitude}</gml:coordinates>` +
      `</gml:Point>` +
      `</${predicate}>` +
      `</Filter>`;

    const url = new URL(this.options.endpoint);
    url.searchParams.set('service', 'WFS');
    url.searchParams.set('request', 'GetFeature');
    url.searchParams.set('version', '1.0.0');
    url.searchParams.set('typeName', this.options.layer);
    url.searchParams.set('outputFormat', 'GML2');
    url.searchParams.set('FILTER', filter);
    url.searchParams.set('PropertyName', this.options.identifierField);
    return url.toString();
  }

  /** Read the identifier out of a GML feature collection. */
  async readIdentifier(body: string): Promise<string | null> {
    let document: unknown;
    try {
      document = await parseStringPromise(body, { xmlns: true });
    } catch (error) {
      throw new PIPError(`response is not well-formed XML: ${errorMessage(error)}`, undefined, { cause: error });
    }

    const root = isNode(document) ? Object.values(document)[0] : undefined;
    if (!isNode(root)) {
      throw new PIPError('empty response');
    }

    let identifier: string | null = null;
    for (const member of childElements(root, { uri: GML_NS, local: 'featureMember' })) {
      const feature = childElements(member, this.layerName)[0];
      const field = feature ? childElements(feature, this.identifierName)[0] : undefined;
      if (field) {
        identifier = textOf(field);
      }
    }
    return identifier;
  }

  private resolveName(qualified: string): ElementName {
    const separator = qualified.indexOf(':');
    if (separator === -1) return { local: qualified };

    const prefix = qualified.slice(0, separator);
    const local = qualified.slice(separator + 1);
    const knownPrefixes: Record<string, string> = {
      gml: GML_NS,
      wfs: WFS_NS,
      [this.options.namespace.prefix]: this.options.namespace.url,
    };
    return { uri: knownPrefixes[prefix], local };
  }
}
