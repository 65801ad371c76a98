import { XMLParser, XMLValidator } from 'fast-xml-parser';
import { CotParseError } from './CotParseError';
import { escapeXml } from './escape';
import { formatCotTimestamp, parseCotTimestamp } from './timestamps';
import {
  COT_UNKNOWN_ERROR,
  COT_VERSION,
  CotChat,
  CotDetail,
  CotEmergency,
  CotEvent,
  CotLink,
  CotMarti,
  CotPoint,
  CotRawElement,
  CotSalute,
  CotTakVersion,
} from './types';

export type CotParseWarning = 'STALE_BEFORE_START';

export type CotParseResult =
  | { success: true; event: CotEvent; warnings: CotParseWarning[] }
  | { success: false; error: CotParseError };

export interface SerializeCotOptions {
  /** Emit the `<?xml ...?>` declaration. Default: true */
  declaration?: boolean;
}

const ATTR_PREFIX = '@_';
const ATTRS_KEY = ':@';
const TEXT_KEY = '#text';
const XML_DECLARATION = '<?xml version="1.0" encoding="UTF-8"?>';

// Ordered output keeps interleaved siblings (`<color/><usericon/><color/>`)
// in document order.
const parser = new XMLParser({
  preserveOrder: true,
  ignoreAttributes: false,
  attributeNamePrefix: ATTR_PREFIX,
  textNodeName: TEXT_KEY,
  parseTagValue: false,
  parseAttributeValue: false,
  trimValues: false,
  removeNSPrefix: true,
  ignoreDeclaration: true,
  ignorePiTags: true,
  processEntities: true,
  // Adds numeric character references (`&#10;`, `&#x41;`) to the five named entities.
  htmlEntities: true,
});

/**
 * Element as seen by the decoder: attributes, concatenated text, and child
 * elements in document order.
 */
interface XmlNode {
  attributes: Record<string, string>;
  text?: string;
  children: Array<{ name: string; node: XmlNode }>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert one ordered-parser entry list (the content of an element) and the
 * element's attribute group into an `XmlNode`.
 */
function toNode(content: unknown, attributes: unknown): XmlNode {
  const node: XmlNode = { attributes: {}, children: [] };

  if (isRecord(attributes)) {
    for (const [key, value] of Object.entries(attributes)) {
      if (key.startsWith(ATTR_PREFIX)) {
        node.attributes[key.slice(ATTR_PREFIX.length)] = String(value);
      }
    }
  }

  if (!Array.isArray(content)) {
    return node;
  }

  let text: string | undefined;
  for (const entry of content) {
    if (!isRecord(entry)) continue;
    for (const [key, value] of Object.entries(entry)) {
      if (key === ATTRS_KEY) continue;
      if (key === TEXT_KEY) {
        text = (text ?? '') + String(value);
      } else {
        node.children.push({ name: key, node: toNode(value, entry[ATTRS_KEY]) });
      }
    }
  }
  if (text !== undefined) {
    node.text = text;
  }

  return node;
}

/** Find the top-level `<event>` among the parsed document entries. */
function findRoot(parsed: unknown): XmlNode | undefined {
  if (!Array.isArray(parsed)) return undefined;
  for (const entry of parsed) {
    if (isRecord(entry) && 'event' in entry) {
      return toNode(entry.event, entry[ATTRS_KEY]);
    }
  }
  return undefined;
}

function attr(node: XmlNode, name: string): string | undefined {
  const value = node.attributes[name];
  return value === '' ? undefined : value;
}

function parseNumber(value: string | undefined): number | null {
  if (value === undefined || value.trim() === '') {
    return null;
  }
  const n = Number(value);
  return Number.isFinite(n) ? n : null;
}

function parseFlag(value: string | undefined): boolean | undefined | null {
  if (value === undefined) return undefined;
  if (value === 'true' || value === '1') return true;
  if (value === 'false' || value === '0') return false;
  return null;
}

function toRawElement(name: string, node: XmlNode): CotRawElement {
  const raw: CotRawElement = {
    name,
    attributes: { ...node.attributes },
    children: node.children.map((c) => toRawElement(c.name, c.node)),
  };
  const text = node.text;
  if (text !== undefined && text !== '' && (raw.children.length === 0 || text.trim() !== '')) {
    raw.text = text;
  }
  return raw;
}

function failure(error: CotParseError): CotParseResult {
  return { success: false, error };
}

function parsePoint(root: XmlNode): CotPoint | CotParseError {
  const pointEntry = root.children.find((c) => c.name === 'point');
  if (!pointEntry) {
    return CotParseError.missingField('point');
  }
  const point = pointEntry.node;

  const latText = point.attributes.lat;
  const lonText = point.attributes.lon;
  if (latText === undefined || latText === '') return CotParseError.missingField('point.lat');
  if (lonText === undefined || lonText === '') return CotParseError.missingField('point.lon');

  const lat = parseNumber(latText);
  if (lat === null || lat < -90 || lat > 90) return CotParseError.invalidCoordinate('point.lat', latText);
  const lon = parseNumber(lonText);
  if (lon === null || lon < -180 || lon > 180) return CotParseError.invalidCoordinate('point.lon', lonText);

  return {
    lat,
    lon,
    hae: parseNumber(point.attributes.hae) ?? 0,
    ce: parseNumber(point.attributes.ce) ?? COT_UNKNOWN_ERROR,
    le: parseNumber(point.attributes.le) ?? COT_UNKNOWN_ERROR,
  };
}

function parseChat(node: XmlNode): CotChat | null {
  const id = attr(node, 'id');
  const chatroom = attr(node, 'chatroom');
  const senderCallsign = attr(node, 'senderCallsign');
  if (!id || !chatroom || !senderCallsign) return null;

  const chat: CotChat = { id, chatroom, senderCallsign };
  const parent = attr(node, 'parent');
  if (parent) chat.parent = parent;

  if (node.children.length > 1) return null;
  const grp = node.children[0];
  if (grp) {
    const uid0 = grp.name === 'chatgrp' ? attr(grp.node, 'uid0') : undefined;
    if (!uid0) return null;
    chat.chatgrp = { uid0 };
    const uid1 = attr(grp.node, 'uid1');
    const grpId = attr(grp.node, 'id');
    if (uid1) chat.chatgrp.uid1 = uid1;
    if (grpId) chat.chatgrp.id = grpId;
  }
  return chat;
}

function parseMarti(node: XmlNode): CotMarti | null {
  if (Object.keys(node.attributes).length > 0) return null;
  const dest: CotMarti['dest'] = [];
  for (const child of node.children) {
    const callsign = child.name === 'dest' ? attr(child.node, 'callsign') : undefined;
    if (!callsign) return null;
    dest.push({ callsign });
  }
  return { dest };
}

function parseEmergency(node: XmlNode): CotEmergency | null {
  const cancel = parseFlag(node.attributes.cancel);
  if (cancel === null) return null;

  const emergency: CotEmergency = {};
  const type = attr(node, 'type');
  if (type) emergency.type = type;
  if (cancel !== undefined) emergency.cancel = cancel;
  if (node.text !== undefined && node.text !== '') emergency.text = node.text;
  return emergency;
}

const SALUTE_FIELDS = ['size', 'activity', 'location', 'unit', 'time', 'equipment'] as const;

type SaluteField = (typeof SALUTE_FIELDS)[number];

function isSaluteField(name: string): name is SaluteField {
  return SALUTE_FIELDS.some((field) => field === name);
}

function parseSalute(node: XmlNode): CotSalute | null {
  if (Object.keys(node.attributes).length > 0) return null;
  const salute: CotSalute = {};
  const seen = new Set<string>();
  for (const child of node.children) {
    const { name } = child;
    if (!isSaluteField(name) || seen.has(name)) return null;
    seen.add(name);
    if (child.node.children.length > 0 || Object.keys(child.node.attributes).length > 0) return null;
    const text = child.node.text;
    if (text !== undefined && text !== '') salute[name] = text;
  }
  return salute;
}

/**
 * Decode one detail child into `detail`. Returns false when the element is
 * not understood, so the caller keeps it as a raw element.
 */
function applyDetailElement(detail: CotDetail, name: string, node: XmlNode): boolean {
  switch (name) {
    case 'contact': {
      const callsign = node.attributes.callsign;
      if (detail.contact || callsign === undefined) return false;
      detail.contact = { callsign };
      const endpoint = attr(node, 'endpoint');
      if (endpoint) detail.contact.endpoint = endpoint;
      return true;
    }
    case '__group': {
      const groupName = attr(node, 'name');
      const role = attr(node, 'role');
      if (detail.group || !groupName || !role) return false;
      detail.group = { name: groupName, role };
      return true;
    }
    case 'track': {
      const speed = parseNumber(node.attributes.speed);
      const course = parseNumber(node.attributes.course);
      if (detail.track || speed === null || course === null) return false;
      detail.track = { speed, course };
      return true;
    }
    case 'status': {
      const battery = parseNumber(node.attributes.battery);
      if (detail.status || battery === null) return false;
      detail.status = { battery };
      return true;
    }
    case 'precisionlocation': {
      const geopointsrc = attr(node, 'geopointsrc');
      const altsrc = attr(node, 'altsrc');
      if (detail.precisionLocation || !geopointsrc || !altsrc) return false;
      detail.precisionLocation = { geopointsrc, altsrc };
      return true;
    }
    case 'takv': {
      if (detail.takv) return false;
      const takv: CotTakVersion = {};
      for (const key of ['device', 'platform', 'os', 'version'] as const) {
        const value = attr(node, key);
        if (value) takv[key] = value;
      }
      detail.takv = takv;
      return true;
    }
    case 'link': {
      const uid = attr(node, 'uid');
      if (!uid) return false;
      const link: CotLink = { uid };
      const relation = attr(node, 'relation');
      const type = attr(node, 'type');
      const parentCallsign = attr(node, 'parent_callsign');
      const productionTime = attr(node, 'production_time');
      if (relation) link.relation = relation;
      if (type) link.type = type;
      if (parentCallsign) link.parentCallsign = parentCallsign;
      if (productionTime) link.productionTime = productionTime;
      (detail.links ??= []).push(link);
      return true;
    }
    case 'remarks': {
      if (detail.remarks) return false;
      detail.remarks = { text: node.text ?? '' };
      const source = attr(node, 'source');
      const to = attr(node, 'to');
      const time = attr(node, 'time');
      if (source) detail.remarks.source = source;
      if (to) detail.remarks.to = to;
      if (time) detail.remarks.time = time;
      return true;
    }
    case '__chat': {
      const chat = detail.chat ? null : parseChat(node);
      if (!chat) return false;
      detail.chat = chat;
      return true;
    }
    case 'marti': {
      const marti = detail.marti ? null : parseMarti(node);
      if (!marti) return false;
      detail.marti = marti;
      return true;
    }
    case '__geofence': {
      const id = attr(node, 'id');
      const fenceName = attr(node, 'name');
      if (detail.geofence || !id || !fenceName) return false;
      detail.geofence = { id, name: fenceName };
      const event = attr(node, 'event');
      const userId = attr(node, 'userId');
      if (event) detail.geofence.event = event;
      if (userId) detail.geofence.userId = userId;
      return true;
    }
    case 'emergency': {
      const emergency = detail.emergency ? null : parseEmergency(node);
      if (!emergency) return false;
      detail.emergency = emergency;
      return true;
    }
    case '__salute__': {
      const salute = detail.salute ? null : parseSalute(node);
      if (!salute) return false;
      detail.salute = salute;
      return true;
    }
    default:
      return false;
  }
}

function parseDetail(node: XmlNode): CotDetail {
  const detail: CotDetail = {};
  for (const child of node.children) {
    if (!applyDetailElement(detail, child.name, child.node)) {
      (detail.extras ??= []).push(toRawElement(child.name, child.node));
    }
  }
  return detail;
}

/**
 * Decode a CoT XML message.
 *
 * Never throws for malformed input: every failure comes back as a
 * `CotParseError` inside the result.
 */
export function parseCot(xml: string): CotParseResult {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    return failure(CotParseError.malformedXml(validation.err.msg));
  }

  let parsed: unknown;
  try {
    parsed = parser.parse(xml);
  } catch (err) {
    return failure(CotParseError.malformedXml(err instanceof Error ? err.message : String(err)));
  }

  const root = findRoot(parsed);
  if (!root) {
    return failure(CotParseError.malformedXml('root element is not <event>'));
  }

  for (const field of ['uid', 'type', 'time', 'start', 'stale'] as const) {
    if (!attr(root, field)) {
      return failure(CotParseError.missingField(field));
    }
  }

  const times: Record<'time' | 'start' | 'stale', number> = { time: 0, start: 0, stale: 0 };
  for (const field of ['time', 'start', 'stale'] as const) {
    const text = root.attributes[field];
    const ms = parseCotTimestamp(text);
    if (ms === null) {
      return failure(CotParseError.invalidTimestamp(field, text));
    }
    times[field] = ms;
  }

  const point = parsePoint(root);
  if (point instanceof CotParseError) {
    return failure(point);
  }

  const event: CotEvent = {
    version: attr(root, 'version') ?? COT_VERSION,
    uid: root.attributes.uid,
    type: root.attributes.type,
    time: times.time,
    start: times.start,
    stale: times.stale,
    how: root.attributes.how ?? '',
    point,
  };

  const detailEntry = root.children.find((c) => c.name === 'detail');
  if (detailEntry) {
    event.detail = parseDetail(detailEntry.node);
  }

  const warnings: CotParseWarning[] = [];
  if (event.stale < event.start) {
    warnings.push('STALE_BEFORE_START');
  }

  return { success: true, event, warnings };
}

type AttrValue = string | number | boolean | undefined;

function attrs(pairs: Array<[string, AttrValue]>): string {
  let out = '';
  for (const [name, value] of pairs) {
    if (value === undefined) continue;
    // String(-0) is "0"
    const text = Object.is(value, -0) ? '-0' : String(value);
    out += ` ${name}="${escapeXml(text)}"`;
  }
  return out;
}

function element(name: string, pairs: Array<[string, AttrValue]>, inner?: string): string {
  const open = `<${name}${attrs(pairs)}`;
  return inner === undefined || inner === '' ? `${open}/>` : `${open}>${inner}</${name}>`;
}

function serializeRaw(raw: CotRawElement): string {
  const inner = (raw.text !== undefined ? escapeXml(raw.text) : '') + raw.children.map(serializeRaw).join('');
  return element(raw.name, Object.entries(raw.attributes), inner);
}

function serializeChat(chat: CotChat): string {
  const grp = chat.chatgrp
    ? element('chatgrp', [
        ['uid0', chat.chatgrp.uid0],
        ['uid1', chat.chatgrp.uid1],
        ['id', chat.chatgrp.id],
      ])
    : undefined;
  return element(
    '__chat',
    [
      ['id', chat.id],
      ['chatroom', chat.chatroom],
      ['senderCallsign', chat.senderCallsign],
      ['parent', chat.parent],
    ],
    grp
  );
}

function serializeDetail(detail: CotDetail): string {
  const parts: string[] = [];

  if (detail.contact) {
    parts.push(element('contact', [['callsign', detail.contact.callsign], ['endpoint', detail.contact.endpoint]]));
  }
  if (detail.group) {
    parts.push(element('__group', [['name', detail.group.name], ['role', detail.group.role]]));
  }
  if (detail.precisionLocation) {
    parts.push(
      element('precisionlocation', [
        ['geopointsrc', detail.precisionLocation.geopointsrc],
        ['altsrc', detail.precisionLocation.altsrc],
      ])
    );
  }
  if (detail.status) {
    parts.push(element('status', [['battery', detail.status.battery]]));
  }
  if (detail.track) {
    parts.push(element('track', [['speed', detail.track.speed], ['course', detail.track.course]]));
  }
  if (detail.takv) {
    const { device, platform, os, version } = detail.takv;
    parts.push(element('takv', [['device', device], ['platform', platform], ['os', os], ['version', version]]));
  }
  for (const link of detail.links ?? []) {
    parts.push(
      element('link', [
        ['uid', link.uid],
        ['relation', link.relation],
        ['type', link.type],
        ['parent_callsign', link.parentCallsign],
        ['production_time', link.productionTime],
      ])
    );
  }
  if (detail.chat) {
    parts.push(serializeChat(detail.chat));
  }
  if (detail.geofence) {
    const { id, name, event, userId } = detail.geofence;
    parts.push(element('__geofence', [['id', id], ['name', name], ['event', event], ['userId', userId]]));
  }
  if (detail.emergency) {
    const { type, cancel, text } = detail.emergency;
    parts.push(element('emergency', [['type', type], ['cancel', cancel]], text !== undefined ? escapeXml(text) : undefined));
  }
  if (detail.salute) {
    const salute = detail.salute;
    const fields = SALUTE_FIELDS.map((field) => {
      const value = salute[field];
      return value === undefined ? '' : `<${field}>${escapeXml(value)}</${field}>`;
    });
    parts.push(element('__salute__', [], fields.join('')));
  }
  if (detail.remarks) {
    const { text, source, to, time } = detail.remarks;
    parts.push(`<remarks${attrs([['source', source], ['to', to], ['time', time]])}>${escapeXml(text)}</remarks>`);
  }
  if (detail.marti) {
    parts.push(element('marti', [], detail.marti.dest.map((d) => element('dest', [['callsign', d.callsign]])).join('')));
  }
  for (const raw of detail.extras ?? []) {
    parts.push(serializeRaw(raw));
  }

  return element('detail', [], parts.join(''));
}

/**
 * Encode an event as CoT XML. Every text-bearing value is escaped.
 */
export function serializeCot(event: CotEvent, options: SerializeCotOptions = {}): string {
  const { point } = event;
  const head = `<event${attrs([
    ['version', event.version],
    ['uid', event.uid],
    ['type', event.type],
    ['time', formatCotTimestamp(event.time)],
    ['start', formatCotTimestamp(event.start)],
    ['stale', formatCotTimestamp(event.stale)],
    ['how', event.how],
  ])}>`;
  const body =
    element('point', [
      ['lat', point.lat],
      ['lon', point.lon],
      ['hae', point.hae],
      ['ce', point.ce],
      ['le', point.le],
    ]) + (event.detail ? serializeDetail(event.detail) : '');

  const xml = `${head}${body}</event>`;
  return options.declaration === false ? xml : `${XML_DECLARATION}${xml}`;
}
