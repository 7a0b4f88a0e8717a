/**
 * Environment variables set by serverless platforms:
 * AWS Lambda, Google Cloud Functions / Cloud Run, Azure Functions, Vercel and Netlify.
 */
const SERVERLESS_ENV_VARS = [
  // AWS Lambda
  'AWS_LAMBDA_FUNCTION_NAME',
  'AWS_EXECUTION_ENV',
  'LAMBDA_TASK_ROOT',
  // Google Cloud Functions / Cloud Run
  'FUNCTION_NAME',
  'FUNCTION_TARGET',
  'K_SERVICE',
  // Azure Functions
  'FUNCTIONS_WORKER_RUNTIME',
  'AZURE_FUNCTIONS_ENVIRONMENT',
  // Vercel
  'VERCEL',
  // Netlify Functions
  'NETLIFY',
] as const;

/**
 * Detects if the application is running in a serverless environment,
 * where database pools should hold a single connection.
 *
 * @param env - Environment to inspect (defaults to `process.env`)
 */
export function isServerlessEnvironment(env: NodeJS.ProcessEnv = process.env): boolean {
  return SERVERLESS_ENV_VARS.some((name) => Boolean(env[name]));
}
