// ABOUTME: Decodes MusicBrainz WS2 search XML into typed result envelopes.
// ABOUTME: Either the whole page decodes or a DecodeError is thrown; there are no partial results.

import { MUSICBRAINZ_CONFIG, type EntityKind } from '@mbsearch/config';
import {
  DecodeError,
  attr,
  child,
  childText,
  children,
  ownText,
  parseBooleanSafe,
  parseIntSafe,
  parseXml,
  rootName,
  type XmlNode,
} from '@mbsearch/shared';
import type {
  Alias,
  Area,
  Artist,
  EntityMap,
  LabelInfo,
  LifeSpan,
  Medium,
  NameCredit,
  Release,
  ReleaseGroup,
  ReleaseGroupRef,
  ReleaseRef,
  SearchResult,
  Tag,
} from './types';

const SERVICE = 'MusicBrainz';

interface EntityDecoder<K extends EntityKind> {
  /** Tag name of each entity inside the list element */
  element: string;
  decode: (node: XmlNode) => EntityMap[K];
}

type EntityDecoders = { [K in EntityKind]: EntityDecoder<K> };

function requireAttr(node: XmlNode, name: string, element: string): string {
  const value = attr(node, name);
  if (value === undefined || value === '') {
    throw new DecodeError(SERVICE, `<${element}> is missing its ${name} attribute`);
  }
  return value;
}

function requireText(node: XmlNode, name: string, element: string): string {
  const value = childText(node, name);
  if (value === undefined) {
    throw new DecodeError(SERVICE, `<${element}> is missing <${name}>`);
  }
  return value;
}

function decodeTag(node: XmlNode): Tag {
  return {
    name: requireText(node, 'name', 'tag'),
    score: parseIntSafe(attr(node, 'score')),
    count: parseIntSafe(attr(node, 'count')),
  };
}

function decodeTagList(node: XmlNode): Tag[] {
  const list = child(node, 'tag-list');
  return list ? children(list, 'tag').map(decodeTag) : [];
}

function decodeArea(node: XmlNode | undefined, element: string): Area | undefined {
  if (!node) return undefined;
  return {
    id: requireAttr(node, 'id', element),
    name: requireText(node, 'name', element),
    sortName: childText(node, 'sort-name'),
  };
}

function decodeLifeSpan(node: XmlNode | undefined): LifeSpan | undefined {
  if (!node) return undefined;
  return {
    begin: childText(node, 'begin'),
    end: childText(node, 'end'),
    ended: parseBooleanSafe(childText(node, 'ended')),
  };
}

function decodeAlias(node: XmlNode): Alias {
  const name = ownText(node);
  if (name === undefined) {
    throw new DecodeError(SERVICE, '<alias> has no text');
  }
  return {
    name,
    sortName: attr(node, 'sort-name'),
    locale: attr(node, 'locale'),
    type: attr(node, 'type'),
    primary: attr(node, 'primary') === 'primary',
  };
}

function decodeArtist(node: XmlNode): Artist {
  const aliasList = child(node, 'alias-list');
  return {
    id: requireAttr(node, 'id', 'artist'),
    type: attr(node, 'type'),
    score: parseIntSafe(attr(node, 'score')),
    name: requireText(node, 'name', 'artist'),
    sortName: childText(node, 'sort-name'),
    gender: childText(node, 'gender'),
    country: childText(node, 'country'),
    disambiguation: childText(node, 'disambiguation'),
    area: decodeArea(child(node, 'area'), 'area'),
    beginArea: decodeArea(child(node, 'begin-area'), 'begin-area'),
    lifeSpan: decodeLifeSpan(child(node, 'life-span')),
    aliases: aliasList ? children(aliasList, 'alias').map(decodeAlias) : [],
    tags: decodeTagList(node),
  };
}

function decodeNameCredit(node: XmlNode): NameCredit {
  const artist = child(node, 'artist');
  if (!artist) {
    throw new DecodeError(SERVICE, '<name-credit> has no <artist>');
  }
  return {
    name: childText(node, 'name'),
    joinPhrase: attr(node, 'joinphrase'),
    artist: {
      id: requireAttr(artist, 'id', 'artist'),
      name: requireText(artist, 'name', 'artist'),
      sortName: childText(artist, 'sort-name'),
      disambiguation: childText(artist, 'disambiguation'),
    },
  };
}

function decodeArtistCredit(node: XmlNode): NameCredit[] {
  const credit = child(node, 'artist-credit');
  return credit ? children(credit, 'name-credit').map(decodeNameCredit) : [];
}

function decodeReleaseGroupRef(node: XmlNode | undefined): ReleaseGroupRef | undefined {
  if (!node) return undefined;
  return {
    id: requireAttr(node, 'id', 'release-group'),
    type: attr(node, 'type'),
    primaryType: childText(node, 'primary-type'),
    title: childText(node, 'title'),
  };
}

function decodeLabelInfo(node: XmlNode): LabelInfo {
  const label = child(node, 'label');
  return {
    catalogNumber: childText(node, 'catalog-number'),
    label: label
      ? { id: requireAttr(label, 'id', 'label'), name: requireText(label, 'name', 'label') }
      : undefined,
  };
}

function decodeMedium(node: XmlNode): Medium {
  const discList = child(node, 'disc-list');
  const trackList = child(node, 'track-list');
  return {
    format: childText(node, 'format'),
    discCount: parseIntSafe(discList ? attr(discList, 'count') : undefined) ?? 0,
    trackCount: parseIntSafe(trackList ? attr(trackList, 'count') : undefined) ?? 0,
  };
}

function decodeRelease(node: XmlNode): Release {
  const textRepresentation = child(node, 'text-representation');
  const labelInfoList = child(node, 'label-info-list');
  const mediumList = child(node, 'medium-list');
  const media = mediumList ? children(mediumList, 'medium').map(decodeMedium) : [];
  const listedTrackCount = mediumList ? parseIntSafe(childText(mediumList, 'track-count')) : undefined;

  return {
    id: requireAttr(node, 'id', 'release'),
    score: parseIntSafe(attr(node, 'score')),
    title: requireText(node, 'title', 'release'),
    status: childText(node, 'status'),
    packaging: childText(node, 'packaging'),
    disambiguation: childText(node, 'disambiguation'),
    textRepresentation: textRepresentation
      ? {
          language: childText(textRepresentation, 'language'),
          script: childText(textRepresentation, 'script'),
        }
      : undefined,
    artistCredit: decodeArtistCredit(node),
    releaseGroup: decodeReleaseGroupRef(child(node, 'release-group')),
    date: childText(node, 'date'),
    country: childText(node, 'country'),
    barcode: childText(node, 'barcode'),
    asin: childText(node, 'asin'),
    labelInfo: labelInfoList ? children(labelInfoList, 'label-info').map(decodeLabelInfo) : [],
    media,
    trackCount: listedTrackCount ?? media.reduce((total, medium) => total + medium.trackCount, 0),
    tags: decodeTagList(node),
  };
}

function decodeReleaseRef(node: XmlNode): ReleaseRef {
  return {
    id: requireAttr(node, 'id', 'release'),
    title: requireText(node, 'title', 'release'),
    status: childText(node, 'status'),
  };
}

function decodeReleaseGroup(node: XmlNode): ReleaseGroup {
  const secondaryTypeList = child(node, 'secondary-type-list');
  const releaseList = child(node, 'release-list');

  return {
    id: requireAttr(node, 'id', 'release-group'),
    type: attr(node, 'type'),
    score: parseIntSafe(attr(node, 'score')),
    title: requireText(node, 'title', 'release-group'),
    primaryType: childText(node, 'primary-type'),
    secondaryTypes: secondaryTypeList
      ? children(secondaryTypeList, 'secondary-type').flatMap((type) => ownText(type) ?? [])
      : [],
    disambiguation: childText(node, 'disambiguation'),
    firstReleaseDate: childText(node, 'first-release-date'),
    artistCredit: decodeArtistCredit(node),
    releases: releaseList ? children(releaseList, 'release').map(decodeReleaseRef) : [],
    tags: decodeTagList(node),
  };
}

const ENTITY_DECODERS: EntityDecoders = {
  artist: { element: 'artist', decode: decodeArtist },
  release: { element: 'release', decode: decodeRelease },
  'release-group': { element: 'release-group', decode: decodeReleaseGroup },
  tag: { element: 'tag', decode: decodeTag },
};

/**
 * Decode a search response body for the given entity kind.
 *
 * @throws DecodeError when the body is not well-formed XML, lacks the
 * `<metadata>` root or the kind's list element, or an entity is missing a
 * required field
 */
export function decodeSearchResponse<K extends EntityKind>(kind: K, xml: string): SearchResult<K> {
  const document = parseXml(xml, SERVICE);

  const metadata = child(document, 'metadata');
  if (!metadata) {
    throw new DecodeError(SERVICE, `expected <metadata> root, found <${rootName(document) ?? 'nothing'}>`);
  }

  const listElement = MUSICBRAINZ_CONFIG.listElements[kind];
  const list = child(metadata, listElement);
  if (!list) {
    throw new DecodeError(SERVICE, `response has no <${listElement}>`);
  }

  const decoder: EntityDecoder<K> = ENTITY_DECODERS[kind];
  const entities = children(list, decoder.element).map(decoder.decode);

  return {
    kind,
    created: attr(metadata, 'created'),
    count: parseIntSafe(attr(list, 'count')) ?? entities.length,
    offset: parseIntSafe(attr(list, 'offset')) ?? 0,
    entities,
  };
}

/**
 * Pull the message out of a WS2 error document (`<error><text>…</text></error>`).
 * Returns undefined for anything else, including malformed bodies.
 */
export function decodeErrorText(xml: string): string | undefined {
  try {
    const error = child(parseXml(xml, SERVICE), 'error');
    if (!error) return undefined;
    const messages = children(error, 'text').flatMap((text) => ownText(text) ?? []);
    return messages.length > 0 ? messages.join(' ') : undefined;
  } catch (error) {
    if (error instanceof DecodeError) return undefined;
    throw error;
  }
}
