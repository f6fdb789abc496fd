import type { ReplayEvent, ReplayFooter, ReplayProfile } from "../types";
import { decodeLatin1, encodeLatin1 } from "./byteStream";
import { INFO_FIELD_SEPARATOR } from "./constants";
import { DecodeError, FormatError } from "./errors";

const SEPARATOR = "\r";
const REAL_TIME_LABEL = "RealTime: ";
const SKIN_LABEL = "Skin: ";
const BANNER_HEAD = "Minesweeper Arbiter ";
const BANNER_TAIL = ". Copyright \u00a9 2005-2006 Dmitriy I. Sukhomlynov";

/**
 * RealTime is whole seconds of the last event followed by the last three
 * characters of the final field of the info block.
 */
export function deriveRealTime(events: readonly ReplayEvent[], tsInfo: Uint8Array): string {
  const last = events[events.length - 1];
  if (!last) {
    throw new FormatError("MALFORMED_FOOTER", "RealTime cannot be derived for a replay without events");
  }
  const fieldStart = tsInfo.lastIndexOf(INFO_FIELD_SEPARATOR) + 1;
  const field = tsInfo.subarray(fieldStart);
  const fraction = field.subarray(Math.max(0, field.length - 3));
  return `${Math.floor(last.gametime / 1000)}${decodeLatin1(fraction)}`;
}

export type FooterContext = {
  profile: ReplayProfile;
  events: readonly ReplayEvent[];
  tsInfo: Uint8Array;
};

function malformed(message: string): FormatError {
  return new FormatError("MALFORMED_FOOTER", message);
}

/**
 * Split the AVF footer into its parts. Fails unless the text can be rebuilt
 * from those parts exactly.
 */
export function parseAvfFooter(bytes: Uint8Array, ctx: FooterContext): ReplayFooter {
  const fields = decodeLatin1(bytes).split(SEPARATOR);

  // FreeSweeper keeps its RealTime line ahead of the footer
  if (ctx.profile === "avf") {
    const realTime = fields.shift();
    if (realTime === undefined || !realTime.startsWith(REAL_TIME_LABEL)) {
      throw malformed("Footer does not start with a RealTime field");
    }
    const expected = REAL_TIME_LABEL + deriveRealTime(ctx.events, ctx.tsInfo);
    if (realTime !== expected) {
      throw malformed(`Footer has "${realTime}" where "${expected}" was derived`);
    }
  }

  if (fields.length !== 3) {
    throw malformed(`Footer has ${fields.length} fields after RealTime, expected 3`);
  }

  const [skinLine, playerId, banner] = fields;
  if (!skinLine.startsWith(SKIN_LABEL)) {
    throw malformed("Footer skin field has no Skin label");
  }
  if (
    !banner.startsWith(BANNER_HEAD) ||
    !banner.endsWith(BANNER_TAIL) ||
    banner.length < BANNER_HEAD.length + BANNER_TAIL.length
  ) {
    throw malformed("Footer banner is not the Arbiter banner");
  }

  return {
    skin: skinLine.slice(SKIN_LABEL.length),
    playerId,
    arbiterVersion: banner.slice(BANNER_HEAD.length, banner.length - BANNER_TAIL.length),
  };
}

export function renderAvfFooter(footer: ReplayFooter, ctx: FooterContext): Uint8Array {
  const fields = [
    SKIN_LABEL + footer.skin,
    footer.playerId,
    BANNER_HEAD + footer.arbiterVersion + BANNER_TAIL,
  ];
  if (ctx.profile === "avf") {
    fields.unshift(REAL_TIME_LABEL + deriveRealTime(ctx.events, ctx.tsInfo));
  }
  return encodeLatin1(fields.join(SEPARATOR));
}

/** CVF keeps only the three free fields. */
export function encodeCvfFooter(footer: ReplayFooter): Uint8Array {
  return encodeLatin1([footer.skin, footer.playerId, footer.arbiterVersion].join(SEPARATOR));
}

export function decodeCvfFooter(bytes: Uint8Array): ReplayFooter {
  const fields = decodeLatin1(bytes).split(SEPARATOR);
  if (fields.length !== 3) {
    throw new DecodeError("MALFORMED_FOOTER", `CVF footer has ${fields.length} fields, expected 3`);
  }
  const [skin, playerId, arbiterVersion] = fields;
  return { skin, playerId, arbiterVersion };
}
