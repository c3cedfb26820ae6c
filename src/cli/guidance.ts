/**
 * Contextual guidance module for CLI error handling
 * Provides helpful troubleshooting steps based on error types
 */

import type { ErrorGuidance } from '@/types';

export interface GuidanceOptions {
  dev?: boolean;
}

/**
 * Error categories for contextual guidance
 */
const ErrorCategory = {
  Docker: 'docker',
  Permission: 'permission',
  Configuration: 'configuration',
} as const;
type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/**
 * Guidance messages organized by category
 */
const GUIDANCE_MESSAGES = {
  [ErrorCategory.Docker]: {
    title: '💡 Docker-related issue detected:',
    steps: [
      'Ensure Docker Desktop/Engine is running',
      'Check that buildx is available: docker buildx version',
      'Check Docker socket path with: docker context ls',
      'Specify custom socket: --docker-socket <path>',
    ],
  },
  [ErrorCategory.Permission]: {
    title: '💡 Permission issue detected:',
    steps: [
      'Check file/directory permissions of the build context: ls -la',
      'Ensure Docker socket permissions (add user to docker group)',
    ],
  },
  [ErrorCategory.Configuration]: {
    title: '💡 Configuration issue:',
    steps: [
      'Validate configuration: image-publish validate -c <file>',
      'Preview resolved tags: image-publish tags -c <file>',
    ],
  },
};

/**
 * General troubleshooting steps shown for unexpected errors
 */
const GENERAL_TROUBLESHOOTING = [
  'Validate config: image-publish validate -c <file>',
  'Check Docker: docker version',
  'Enable debug logging: --log-level debug',
];

/**
 * Detect error category based on error message
 */
export function detectErrorCategory(error: Error): ErrorCategory | null {
  const message = error.message.toLowerCase();

  if (message.includes('docker') || message.includes('enoent') || message.includes('socket')) {
    return ErrorCategory.Docker;
  }

  if (message.includes('permission') || message.includes('eacces')) {
    return ErrorCategory.Permission;
  }

  if (message.includes('config')) {
    return ErrorCategory.Configuration;
  }

  return null;
}

/**
 * Lines describing a typed failure: message, likely cause and resolution.
 */
export function formatGuidance(guidance: ErrorGuidance): string[] {
  const lines = [`🔍 Error: ${guidance.message}`];
  if (guidance.hint) lines.push(`💡 ${guidance.hint}`);
  if (guidance.resolution) lines.push(`🛠️ ${guidance.resolution}`);
  return lines;
}

/**
 * Provide contextual guidance for an unexpected error
 * @param error - The error that occurred
 * @param options - CLI options (e.g., dev mode)
 */
export function provideContextualGuidance(error: Error, options: GuidanceOptions = {}): void {
  console.error(`\n🔍 Error: ${error.message}`);

  const category = detectErrorCategory(error);
  if (category) {
    const guidance = GUIDANCE_MESSAGES[category];
    console.error(`\n${guidance.title}`);
    guidance.steps.forEach((step) => console.error(`  • ${step}`));
  }

  console.error('\n🛠️ General troubleshooting steps:');
  GENERAL_TROUBLESHOOTING.forEach((step, index) => {
    console.error(`  ${index + 1}. ${step}`);
  });

  if (options.dev && error.stack) {
    console.error(`\n📍 Stack trace:`);
    console.error(error.stack);
  }
}
