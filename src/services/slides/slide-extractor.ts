import { ExtractionError } from '../../lib/errors/bridge-errors.js';
import { findChild, findChildren, iterElements, type XmlElement } from '../../lib/xml/xml-tree.js';
import { sanitizeText } from './text-sanitizer.js';
import type { SlideDocument, SlideFields } from './slide.types.js';

/**
 * Split on any line break; a trailing break does not produce an empty line
 */
export function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

/** Trimmed text, for single-value fields */
function textOf(element: XmlElement | undefined): string {
  return element?.text?.trim() ?? '';
}

function extractVerses(document: SlideDocument, slide: XmlElement): string[][] {
  const verses: string[][] = [];

  for (const container of findChildren(slide, 'slides')) {
    if (container.children.length === 0 && textOf(container) !== '') {
      throw new ExtractionError(`<slides> of slide ${document.slideId} holds text instead of slide elements`, document.slideId);
    }

    for (const element of iterElements(container)) {
      if (element.name === 'body' && element.text !== undefined) {
        verses.push(splitLines(sanitizeText(element.text)));
      }
    }
  }

  return verses;
}

/**
 * Pull title, authors, CCLI number and verse text out of an OpenSong slide.
 *
 * Only the <slide> element is required; every field inside it is optional.
 */
export function extractSlideFields(document: SlideDocument): SlideFields {
  const slide = findChild(document.root, 'slide');
  if (!slide) {
    throw new ExtractionError(
      `Response for slide ${document.slideId} has no <slide> element (root is <${document.root.name}>)`,
      document.slideId
    );
  }

  const authors = findChildren(slide, 'author')
    .map(author => textOf(author))
    .filter(author => author !== '');
  const ccli = textOf(findChild(slide, 'ccli'));

  return {
    title: textOf(findChild(slide, 'title')),
    authors,
    ...(ccli !== '' && { ccli }),
    verses: extractVerses(document, slide),
  };
}
