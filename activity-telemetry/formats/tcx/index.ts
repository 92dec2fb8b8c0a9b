/**
 * TCX (XML) format support
 *
 * Parses with fast-xml-parser and extracts `Trackpoint` elements.
 */

export * from './document.js';
export * from './extract.js';
