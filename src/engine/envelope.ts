import type { EngineErrorCode } from "./errors";
import type { SyncResult } from "./sync";

export type EngineErrorInfo = {
  code: EngineErrorCode;
  message: string;
};

export type ActionOk = {
  ok: true;
  result: SyncResult;
};

export type ActionErr = {
  ok: false;
  error: EngineErrorInfo;
};

export type ActionResponse = ActionOk | ActionErr;
