import { createRequire } from 'node:module';
import os from 'node:os';

export const DRIVER_PACKAGES = ['better-sqlite3', 'pg', 'mssql'] as const;

export type DriverPackage = (typeof DRIVER_PACKAGES)[number];

export type EnvironmentReport = {
  nodeVersion: string;
  platform: string;
  release: string;
  arch: string;
  drivers: Record<DriverPackage, boolean>;
  missing: DriverPackage[];
};

export type ModuleResolver = (name: string) => boolean;

const localRequire = createRequire(import.meta.url);

export const resolveInstalled: ModuleResolver = (name) => {
  try {
    localRequire.resolve(name);
    return true;
  } catch {
    return false;
  }
};

export function checkEnvironment(resolve: ModuleResolver = resolveInstalled): EnvironmentReport {
  const drivers: Record<DriverPackage, boolean> = {
    'better-sqlite3': resolve('better-sqlite3'),
    pg: resolve('pg'),
    mssql: resolve('mssql'),
  };
  return {
    nodeVersion: process.versions.node,
    platform: os.platform(),
    release: os.release(),
    arch: process.arch,
    drivers,
    missing: DRIVER_PACKAGES.filter((name) => !drivers[name]),
  };
}

export function formatEnvironmentReport(report: EnvironmentReport): string[] {
  const lines = [
    `Node.js version: ${report.nodeVersion}`,
    `Platform: ${report.platform} ${report.release}`,
    `Architecture: ${report.arch}`,
    '',
  ];
  for (const name of DRIVER_PACKAGES) {
    lines.push(`${report.drivers[name] ? 'ok     ' : 'missing'} ${name}`);
  }
  lines.push('');
  lines.push(
    report.missing.length
      ? `Environment check failed. Missing packages: ${report.missing.join(', ')}`
      : 'Environment check passed.'
  );
  return lines;
}
