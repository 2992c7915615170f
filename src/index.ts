// This module is a library entry point
// For the daemon, run: npx romlibd serve
// Or: npm run cli -- serve

export * from "./types.js"
export * from "./errors.js"
export * from "./config.js"
export * from "./paths.js"
export * from "./platforms.js"
export * from "./romname.js"
export * from "./rwlock.js"
export * from "./scan/stats.js"
export * from "./library/snapshot.js"
export * from "./library/scanner.js"
export * from "./library/store.js"
export * from "./ipc/protocol.js"
export * from "./ipc/router.js"
export * from "./ipc/server.js"
export * from "./ipc/client.js"
export * from "./daemon.js"
