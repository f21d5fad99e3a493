import type { NextConfig } from "next";

const nextConfig: NextConfig = {
  // exceljs pulls in Node stream/zip modules; load it from node_modules in route handlers instead of bundling.
  serverExternalPackages: ["exceljs"],
};

export default nextConfig;
