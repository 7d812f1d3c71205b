import net from "net";
import tls from "tls";
import { NET } from "./config.js";
import { ProbeError, errorMessage } from "./errors.js";

/**
 * Signature of a certificate expiry probe, injectable for tests.
 */
export type CertificateProbe = (hostname: string, port: number, timeoutMs: number) => Promise<Date>;

/**
 * Parse the `valid_to` field of a peer certificate (e.g. `Mar 24 23:59:59 2026 GMT`).
 *
 * @returns The instant in UTC, or null when the field cannot be parsed.
 */
export function parseCertificateDate(validTo: string | undefined): Date | null {
  if (!validTo) {
    return null;
  }
  const parsed = new Date(validTo);
  return Number.isNaN(parsed.getTime()) ? null : parsed;
}

/**
 * Open a TLS connection and read the peer certificate's expiry.
 *
 * Verification uses the default trust store, so expired, self-signed and
 * mismatched certificates reject like any other handshake failure.
 *
 * @param ca - PEM trust anchors used instead of the default store.
 * @throws ProbeError on connection, handshake or parse failure, carrying the underlying message.
 */
export function probeCertificate(
  hostname: string,
  port: number,
  timeoutMs: number = NET.PROBE_TIMEOUT,
  ca?: string | Buffer
): Promise<Date> {
  return new Promise<Date>((resolve, reject) => {
    let settled = false;
    const socket = tls.connect({
      host: hostname,
      port,
      // SNI does not accept IP literals
      servername: net.isIP(hostname) ? undefined : hostname,
      rejectUnauthorized: true,
      ca
    });

    const finish = (outcome: { readonly expiry: Date } | { readonly failure: string; readonly cause?: unknown }) => {
      if (settled) {
        return;
      }
      settled = true;
      socket.destroy();
      if ("expiry" in outcome) {
        resolve(outcome.expiry);
      } else {
        reject(new ProbeError(outcome.failure, hostname, port, { cause: outcome.cause }));
      }
    };

    socket.setTimeout(timeoutMs, () => {
      finish({ failure: `Connection to ${hostname}:${port} timed out after ${timeoutMs}ms` });
    });
    socket.once("error", cause => {
      finish({ failure: errorMessage(cause), cause });
    });
    socket.once("close", () => {
      finish({ failure: `Connection to ${hostname}:${port} closed before TLS handshake completed` });
    });
    socket.once("secureConnect", () => {
      const certificate = socket.getPeerCertificate();
      if (!certificate || Object.keys(certificate).length === 0) {
        finish({ failure: "No certificate received" });
        return;
      }
      const expiry = parseCertificateDate(certificate.valid_to);
      if (!expiry) {
        finish({ failure: `Unparseable certificate expiry: ${certificate.valid_to}` });
        return;
      }
      finish({ expiry });
    });
  });
}
