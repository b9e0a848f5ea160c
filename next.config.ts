import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  // Search results are never cached; every page turn re-queries GBIF.
  poweredByHeader: false,
};

export default nextConfig;
