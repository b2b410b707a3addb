import { AsyncLocalStorage } from "async_hooks";
import type { CallerIdentity } from "@rentledger/shared";

export type RequestContextStore = {
  requestId: string;
  traceId?: string;
  spanId?: string;
  caller?: CallerIdentity;
  ip?: string;
  userAgent?: string;
};

const storage = new AsyncLocalStorage<RequestContextStore>();

export const RequestContext = {
  run<T>(store: RequestContextStore, callback: () => T) {
    return storage.run(store, callback);
  },
  get() {
    return storage.getStore();
  },
  setCaller(caller: CallerIdentity) {
    const current = storage.getStore();
    if (current) {
      current.caller = caller;
    }
  },
};
