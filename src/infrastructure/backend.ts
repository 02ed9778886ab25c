import { BackendUnavailableError } from "../domain/common/errors";

/**
 * A backend client constructed once at startup. Construction failure is
 * carried as a value so callers decide how to degrade.
 */
export type Backend<T> =
  | { status: "ready"; client: T }
  | { status: "unavailable"; reason: string };

export function ready<T>(client: T): Backend<T> {
  return { status: "ready", client };
}

export function unavailable<T>(reason: string): Backend<T> {
  return { status: "unavailable", reason };
}

export function requireClient<T>(backend: Backend<T>, name: string): T {
  if (backend.status === "unavailable") {
    throw new BackendUnavailableError(name, backend.reason);
  }
  return backend.client;
}
