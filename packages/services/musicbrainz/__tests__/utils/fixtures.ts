// WS2 search response fixtures

const ROOT_ATTRIBUTES =
  'created="2026-10-19T12:00:00.000Z" xmlns="http://musicbrainz.org/ns/mmd-2.0#" xmlns:ext="http://musicbrainz.org/ns/ext#-2.0"';

export const artistSearchXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<metadata ${ROOT_ATTRIBUTES}>
  <artist-list count="2" offset="0">
    <artist id="artist-mbid-1" type="Group" ext:score="100">
      <name>The Beatles</name>
      <sort-name>Beatles, The</sort-name>
      <country>GB</country>
      <area id="area-mbid-gb">
        <name>United Kingdom</name>
        <sort-name>United Kingdom</sort-name>
      </area>
      <begin-area id="area-mbid-liverpool">
        <name>Liverpool</name>
      </begin-area>
      <life-span>
        <begin>1960</begin>
        <end>1970-04-10</end>
        <ended>true</ended>
      </life-span>
      <alias-list>
        <alias sort-name="Fab Four, The">The Fab Four</alias>
        <alias sort-name="Beatles, Los" locale="es" type="Artist name" primary="primary">Los Beatles</alias>
      </alias-list>
      <tag-list>
        <tag count="12"><name>rock</name></tag>
        <tag count="3"><name>british</name></tag>
      </tag-list>
    </artist>
    <artist id="artist-mbid-2" type="Person" ext:score="62">
      <name>Beatles Tribute Singer</name>
      <disambiguation>tribute act</disambiguation>
    </artist>
  </artist-list>
</metadata>`;

export const releaseSearchXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<metadata ${ROOT_ATTRIBUTES}>
  <release-list count="57" offset="10">
    <release id="release-mbid-1" ext:score="98">
      <title>Garden Road</title>
      <status>Official</status>
      <packaging>Jewel Case</packaging>
      <text-representation>
        <language>eng</language>
        <script>Latn</script>
      </text-representation>
      <artist-credit>
        <name-credit>
          <artist id="artist-mbid-1">
            <name>The Beatles</name>
            <sort-name>Beatles, The</sort-name>
          </artist>
        </name-credit>
      </artist-credit>
      <release-group id="rg-mbid-1" type="Album">
        <primary-type>Album</primary-type>
      </release-group>
      <date>1987-04-30</date>
      <country>GB</country>
      <barcode>0000000000001</barcode>
      <label-info-list>
        <label-info>
          <catalog-number>CAT-001</catalog-number>
          <label id="label-mbid-1"><name>Test Records</name></label>
        </label-info>
      </label-info-list>
      <medium-list count="1">
        <track-count>17</track-count>
        <medium>
          <format>CD</format>
          <disc-list count="3"/>
          <track-list count="17"/>
        </medium>
      </medium-list>
    </release>
    <release id="release-mbid-2" ext:score="80">
      <title>Garden Road Sessions</title>
      <artist-credit>
        <name-credit joinphrase=" &amp; ">
          <name>Fab Four</name>
          <artist id="artist-mbid-1"><name>The Beatles</name></artist>
        </name-credit>
        <name-credit>
          <artist id="artist-mbid-3"><name>Test Orchestra</name></artist>
        </name-credit>
      </artist-credit>
      <barcode/>
      <medium-list count="2">
        <medium><format>Vinyl</format><track-list count="8"/></medium>
        <medium><format>Vinyl</format><track-list count="9"/></medium>
      </medium-list>
    </release>
  </release-list>
</metadata>`;

export const releaseGroupSearchXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<metadata ${ROOT_ATTRIBUTES}>
  <release-group-list count="1" offset="0">
    <release-group id="rg-mbid-2" type="Compilation" ext:score="100">
      <title>Live Hits</title>
      <first-release-date>1996-03-18</first-release-date>
      <primary-type>Album</primary-type>
      <secondary-type-list>
        <secondary-type>Compilation</secondary-type>
        <secondary-type>Live</secondary-type>
      </secondary-type-list>
      <artist-credit>
        <name-credit>
          <artist id="artist-mbid-1"><name>The Beatles</name></artist>
        </name-credit>
      </artist-credit>
      <release-list count="2">
        <release id="release-mbid-4"><title>Live Hits</title><status>Official</status></release>
        <release id="release-mbid-5"><title>Live Hits (Deluxe)</title></release>
      </release-list>
      <tag-list>
        <tag count="1"><name>live</name></tag>
      </tag-list>
    </release-group>
  </release-group-list>
</metadata>`;

export const tagSearchXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<metadata ${ROOT_ATTRIBUTES}>
  <tag-list count="3" offset="0">
    <tag ext:score="100"><name>shoegaze</name></tag>
    <tag ext:score="71"><name>nu gaze</name></tag>
    <tag ext:score="40"><name>311</name></tag>
  </tag-list>
</metadata>`;

export const emptyArtistSearchXml = `<?xml version="1.0" encoding="UTF-8" standalone="yes"?>
<metadata ${ROOT_ATTRIBUTES}><artist-list count="0" offset="0"/></metadata>`;

export const errorXml = `<?xml version="1.0" encoding="UTF-8"?>
<error><text>Invalid query</text><text>For usage, please see: https://musicbrainz.org/development/mmd</text></error>`;

export const malformedXml = '<metadata><artist-list count="1"><artist id="a">';

/** Search fixtures keyed by entity kind */
export const searchFixtures = {
  artist: artistSearchXml,
  release: releaseSearchXml,
  'release-group': releaseGroupSearchXml,
  tag: tagSearchXml,
} as const;
