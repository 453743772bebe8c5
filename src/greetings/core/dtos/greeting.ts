export interface GreetingResponse {
  message: string;
}

export type AccessStatus = "authenticated" | "anonymous";

export interface ProtectedResourceResponse {
  message: string;
  status: AccessStatus;
}

/**
 * Identity of the caller as bound to the request logger.
 * `user` is null for anonymous callers.
 */
export interface UserInfoResponse {
  user: string | null;
  request_id: string;
  path: string;
  method: string;
}
