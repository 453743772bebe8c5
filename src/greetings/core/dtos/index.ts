export type {
  GreetingResponse,
  AccessStatus,
  ProtectedResourceResponse,
  UserInfoResponse,
} from "./greeting";
