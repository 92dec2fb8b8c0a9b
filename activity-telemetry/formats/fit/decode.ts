/**
 * FIT decoding backed by the Garmin FIT SDK
 */

import { Decoder, Stream } from '@garmin/fitsdk';
import type { FitMessages, Mesg } from '@garmin/fitsdk';
import type { BinaryMessageDecoder, DecodedFitFile, FitMessage } from './types.js';
import { FitDecodeError } from './types.js';

/**
 * Convert a profile name (`heart_rate`) to the SDK's key (`heartRate`)
 */
export function toSdkFieldName(name: string): string {
  return name.replace(/_([a-z0-9])/g, (_match, char: string) => char.toUpperCase());
}

/**
 * SDK key holding messages of a kind (`record` -> `recordMesgs`)
 */
export function toSdkMessageKey(kind: string): string {
  return `${toSdkFieldName(kind)}Mesgs`;
}

type DecoderReadResult = ReturnType<Decoder['read']>;

function isMessageKey(key: string, messages: FitMessages): key is keyof FitMessages {
  return Object.prototype.hasOwnProperty.call(messages, key);
}

class SdkFitMessage implements FitMessage {
  private readonly fields: Map<string, unknown>;

  constructor(mesg: Mesg) {
    this.fields = new Map<string, unknown>(Object.entries(mesg));
  }

  get(field: string): unknown {
    return this.fields.get(toSdkFieldName(field));
  }
}

/**
 * Decoded view over an SDK read result
 */
class SdkDecodedFitFile implements DecodedFitFile {
  constructor(private readonly result: DecoderReadResult) {}

  messages(kind: string): FitMessage[] {
    const key = toSdkMessageKey(kind);
    if (!isMessageKey(key, this.result.messages)) {
      return [];
    }

    const mesgs: readonly Mesg[] = this.result.messages[key] ?? [];
    return mesgs.map((mesg) => new SdkFitMessage(mesg));
  }
}

/**
 * BinaryMessageDecoder over `@garmin/fitsdk`
 *
 * Scale/offset are applied (speed arrives in m/s) and date-time fields are
 * converted to Date objects. Any error the SDK reports fails the whole file.
 */
export class GarminFitDecoder implements BinaryMessageDecoder {
  decode(bytes: Uint8Array): DecodedFitFile {
    if (bytes.length === 0) {
      throw new FitDecodeError('FIT payload is empty');
    }

    let result: DecoderReadResult;
    try {
      const decoder = new Decoder(Stream.fromByteArray(bytes));
      result = decoder.read({
        applyScaleAndOffset: true,
        expandComponents: true,
        convertDateTimesToDates: true,
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new FitDecodeError(`FIT decode error: ${message}`, { cause: error });
    }

    const [firstError] = result.errors;
    if (firstError) {
      throw new FitDecodeError(`FIT decode error: ${firstError.message}`, { cause: firstError });
    }

    return new SdkDecodedFitFile(result);
  }
}
