// Keep in sync with package.json when cutting a release
export const PACKAGE_INFO = {
  name: 'dotnet-test-visualizer',
  version: '0.3.0',
} as const;
