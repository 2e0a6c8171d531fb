import { DEFAULT_FQDN_SUFFIX } from "../../config";
import { LogParseError } from "../../errors";
import { ConnectionEvent } from "./types";

export type ParseResult =
  | { ok: true; event: ConnectionEvent }
  | { ok: false; error: LogParseError };

export type LogGrammar = {
  fqdnSuffix: string;
  isRelevant(line: string): boolean;
  parse(line: string): ParseResult;
};

const WHITESPACE = /\s/;

/**
 * Grammar for the default CoreDNS `log` plugin format:
 *
 *   [INFO] 10.42.2.90:59003 - 9687 "AAAA IN user-db.sock-shop.svc.cluster.local. udp 53 false 512" NOERROR qr,aa,rd 146 0.000428325s
 *
 * Any change in field order must fail to parse rather than yield a wrong event.
 */
export function createLogGrammar(fqdnSuffix: string = DEFAULT_FQDN_SUFFIX): LogGrammar {
  // checks run in the order the substrings appear in a line
  const isRelevant = (line: string): boolean =>
    line.startsWith("[INFO]") &&
    line.includes(fqdnSuffix) &&
    line.includes("NOERROR") &&
    line.includes(":");

  const parse = (line: string): ParseResult => {
    if (!isRelevant(line)) {
      return { ok: false, error: new LogParseError("not relevant", line) };
    }

    const suffixAt = line.indexOf(fqdnSuffix);
    let hostStart = -1;
    for (let i = suffixAt - 1; i >= 0; i--) {
      if (WHITESPACE.test(line[i])) {
        hostStart = i + 1;
        break;
      }
    }
    if (hostStart < 0 || hostStart === suffixAt) {
      return { ok: false, error: new LogParseError("FQDN not found", line) };
    }
    const hostname = line.slice(hostStart, suffixAt) + fqdnSuffix;

    const endpoint = line.split(/\s+/)[1] ?? "";
    const colonAt = endpoint.lastIndexOf(":");
    if (colonAt < 0) {
      return { ok: false, error: new LogParseError("pod ip:port not found", line) };
    }
    // IPv6 clients are logged as [addr]:port
    const sourceIP = endpoint.slice(0, colonAt).replace(/^\[(.*)\]$/, "$1");
    const sourcePort = endpoint.slice(colonAt + 1);
    if (!sourceIP) {
      return { ok: false, error: new LogParseError("pod ip not found", line) };
    }
    if (!sourcePort) {
      return { ok: false, error: new LogParseError("pod port not found", line) };
    }

    return { ok: true, event: { sourceIP, sourcePort, destinationHostname: hostname } };
  };

  return { fqdnSuffix, isRelevant, parse };
}
