import { defineConfig } from "vite";

const commonSecurityHeaders: Record<string, string> = {
  "X-Content-Type-Options": "nosniff",
  "Referrer-Policy": "no-referrer",
  "Permissions-Policy": "camera=(), microphone=(), geolocation=()",
};

const previewOnlyHeaders: Record<string, string> = {
  // Not on the dev server: a strict CSP interferes with HMR.
  "Content-Security-Policy":
    "default-src 'none'; base-uri 'none'; object-src 'none'; frame-ancestors 'none'; script-src 'self'; connect-src 'self'; img-src 'self' data:; style-src 'self'",
};

export default defineConfig({
  server: {
    headers: commonSecurityHeaders,
  },
  preview: {
    headers: { ...commonSecurityHeaders, ...previewOnlyHeaders },
  },
  build: {
    outDir: "dist",
  },
});
