import type { FamilyOptions } from "../config";
import type { Document, Finding } from "../types";
import type { EvaluationContext } from "./context";
import { escapeRegExp } from "./text";

const EMAIL_PATTERN = /\b[A-Za-z0-9._%+-]+@([A-Za-z0-9.-]+\.[A-Za-z]{2,})\b/g;
const IPV4_PATTERN = /(?<![\w.])(?:\d{1,3}\.){3}\d{1,3}(?![\w]|\.\d)/g;

export function evaluatePii(
  document: Document,
  options: FamilyOptions<"pii">,
  context: EvaluationContext,
): Finding[] {
  const findings: Finding[] = [];
  const allowedDomains = options.allowedEmailDomains.map((domain) => domain.toLowerCase());
  const markers = (options.markers ?? []).map((marker) => ({
    marker,
    pattern: new RegExp(escapeRegExp(marker), "i"),
  }));

  for (const line of document.lines) {
    if (!line.prose) {
      continue;
    }

    if (options.emails) {
      for (const [address, domain] of line.prose.matchAll(EMAIL_PATTERN)) {
        if (isAllowedDomain(domain.toLowerCase(), allowedDomains)) {
          continue;
        }
        findings.push(
          context.finding(
            "pii_email",
            line.number,
            `Possible e-mail address "${address}"`,
            "Remove the address or use a placeholder such as user@example.com",
          ),
        );
      }
    }

    if (
      options.ipAddresses &&
      !line.prose.toLowerCase().includes(options.maskedPrefix.toLowerCase())
    ) {
      for (const [address] of line.prose.matchAll(IPV4_PATTERN)) {
        const octets = address.split(".").map(Number);
        if (octets.some((octet) => octet > 255)) {
          continue;
        }
        findings.push(
          context.finding(
            "pii_ip_address",
            line.number,
            `Possible IP address "${address}"`,
            `Mask the address, for example ${options.maskedPrefix}${octets[3]}`,
          ),
        );
      }
    }

    for (const { marker, pattern } of markers) {
      if (pattern.test(line.prose)) {
        findings.push(
          context.finding(
            "pii_marker",
            line.number,
            `Personal data marker "${marker}"`,
            "Remove personal data from the document",
          ),
        );
      }
    }
  }

  return findings;
}

function isAllowedDomain(domain: string, allowed: string[]): boolean {
  return allowed.some((entry) => domain === entry || domain.endsWith(`.${entry}`));
}
