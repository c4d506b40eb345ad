import type { ErrorCode } from "@shortly/shared";

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E extends ErrorCode>(errorCode: E, error: string): { success: false; errorCode: E; error: string } {
  return { success: false, errorCode, error };
}
