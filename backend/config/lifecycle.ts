// Process lifecycle flags shared by index.ts and the health routes.

/** True once the server is listening AND the database is connected. */
export let isReady = false;

export function setReady(value: boolean) {
  isReady = value;
}

/** True once shutdown has begun. */
export let isShuttingDown = false;

export function setShuttingDown(value: boolean) {
  isShuttingDown = value;
}
