/**
 * ttlink HTTP Service
 *
 * Entry point - starts the server. Import `createApp` from "./app.js"
 * to embed the routes without binding a port.
 */

import "./server.js";
