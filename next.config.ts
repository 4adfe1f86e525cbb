import type { NextConfig } from 'next';

const nextConfig: NextConfig = {
  output: 'standalone',
  serverExternalPackages: ['pg', 'libpg-query'],
  outputFileTracingIncludes: {
    '/api/**/*': ['./config/**/*'],
  },
};

export default nextConfig;
