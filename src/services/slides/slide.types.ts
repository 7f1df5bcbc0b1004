import type { XmlElement } from '../../lib/xml/xml-tree.js';

/** Opaque OpenSong slide identifier (the `itemnumber` of the live slide) */
export type SlideId = string;

/**
 * Parsed response of GET /presentation/slide/<id>
 */
export interface SlideDocument {
  slideId: SlideId;
  root: XmlElement;
}

export interface SlideFields {
  title: string;
  /** In document order */
  authors: string[];
  /** CCLI song number, absent when the slide has none */
  ccli?: string;
  /** One entry per <body>, each split into lines */
  verses: string[][];
}
