/**
 * Discovery Module - Pure Transformations
 */
import { type Result, err, ok } from "neverthrow";

import {
  type ConfigurationError,
  multipleDevices,
  noDevice,
} from "./errors.js";
import type { ListedPort, UsbAdapter } from "./schema.js";
import { USB_ADAPTERS } from "./schema.js";

/**
 * Find the known adapter a listed port belongs to. Ids compare
 * case-insensitively; Windows reports them in upper case.
 */
export function matchAdapter(
  port: ListedPort,
  adapters: ReadonlyArray<UsbAdapter> = USB_ADAPTERS,
): UsbAdapter | null {
  const vendorId = port.vendorId?.toLowerCase();
  const productId = port.productId?.toLowerCase();
  if (vendorId === undefined || productId === undefined) return null;

  return (
    adapters.find(
      (adapter) =>
        adapter.vendorId === vendorId && adapter.productId === productId,
    ) ?? null
  );
}

/**
 * Require exactly one candidate.
 *
 * @param what - Plural noun for messages, e.g. "USB serial adapters"
 */
export function selectSingle<T>(
  candidates: ReadonlyArray<T>,
  what: string,
  label: (candidate: T) => string,
): Result<T, ConfigurationError> {
  const [first, ...rest] = candidates;

  if (first === undefined) {
    return err(noDevice(`No ${what} found`));
  }

  if (rest.length > 0) {
    const labels = candidates.map(label);
    const message = `Found ${labels.length} ${what}: ${labels.join(", ")}`;
    return err(multipleDevices(message, labels));
  }

  return ok(first);
}
