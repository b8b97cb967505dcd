import type { LibraryStore } from "./db/store";
import { createLoanLifecycle, type LoanLifecycle } from "./lib/loan-lifecycle";
import type { Logger } from "./lib/logger";
import type { Clock } from "./lib/time";

export type AppContext = {
  store: LibraryStore;
  clock: Clock;
  logger: Logger;
  loans: LoanLifecycle;
};

export const createAppContext = (deps: Omit<AppContext, "loans">): AppContext => ({
  ...deps,
  loans: createLoanLifecycle(deps)
});
