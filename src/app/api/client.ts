import axios from "axios";

/**
 * Axios instance for the app's own routes under `/api`. The browser never
 * talks to the backend services directly: those routes hold the service
 * URLs and the session token. Timeouts are set per call by `GmeApi`.
 */
export const api = axios.create({
  baseURL: "/api",
  headers: { Accept: "application/json" },
});
