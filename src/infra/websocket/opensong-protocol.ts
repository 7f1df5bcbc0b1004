/**
 * OpenSong WebSocket Message Protocol
 *
 * After the client sends a subscription path (e.g. /ws/subscribe/presentation)
 * OpenSong answers with plain-text acknowledgements and then pushes an XML
 * status document on every presentation change:
 *
 *   <response resource="presentation" action="status">
 *     <presentation running="1">
 *       <screen mode="N"/>
 *       <slide itemnumber="3">...</slide>
 *     </presentation>
 *   </response>
 */

import { iterElements, parseXml, XmlParseError, type XmlElement } from '../../lib/xml/xml-tree.js';
import type { SlideId } from '../../services/slides/slide.types.js';

export const SUBSCRIBE_ACK = 'OK';
export const ALREADY_SUBSCRIBED = 'The requested action is not available.';

export interface StatusNotification {
  kind: 'status';
  /** Presentation mode is active */
  running: boolean;
  /** Live slide; absent when no slide (or slide 0) is shown */
  slideId?: SlideId;
}

export type Notification =
  | StatusNotification
  | { kind: 'ack' }
  | { kind: 'already_subscribed' }
  | { kind: 'unknown'; raw: string };

function parseRunning(value: string | undefined): boolean {
  const flag = Number.parseInt(value ?? '0', 10);
  return Number.isFinite(flag) && flag !== 0;
}

function parseSlideId(value: string | undefined): SlideId | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  const itemNumber = Number(value);
  return itemNumber > 0 ? String(itemNumber) : undefined;
}

function parseStatus(raw: string): StatusNotification | undefined {
  let root: XmlElement;
  try {
    root = parseXml(raw);
  } catch (err) {
    if (err instanceof XmlParseError) return undefined;
    throw err;
  }

  let running = false;
  let slideId: SlideId | undefined;
  // Last occurrence wins, in document order
  for (const element of iterElements(root)) {
    if (element.name === 'presentation') {
      running = parseRunning(element.attributes.running);
    } else if (element.name === 'slide') {
      slideId = parseSlideId(element.attributes.itemnumber);
    }
  }

  return { kind: 'status', running, ...(slideId !== undefined && { slideId }) };
}

export function parseNotification(raw: string): Notification {
  const text = raw.trim();

  if (text === SUBSCRIBE_ACK) return { kind: 'ack' };
  if (text === ALREADY_SUBSCRIBED) return { kind: 'already_subscribed' };

  if (text.startsWith('<') && text.endsWith('>')) {
    const status = parseStatus(text);
    if (status) return status;
  }

  return { kind: 'unknown', raw };
}
