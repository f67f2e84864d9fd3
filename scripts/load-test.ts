/**
 * Load testing script for the URL Shortener
 * Run with: npm run load-test (against a running server)
 */

export {};

const BASE_URL = process.env.BASE_URL || 'http://localhost:3000';
const TOTAL_REQUESTS = parseInt(process.env.REQUESTS || '100', 10);
const CONCURRENCY = parseInt(process.env.CONCURRENCY || '10', 10);

interface TestResult {
  operation: string;
  success: boolean;
  duration: number;
  statusCode?: number;
}

interface Exchange {
  result: TestResult;
  text: string;
  location: string | null;
}

const results: TestResult[] = [];
let mismatches = 0;

async function makeRequest(method: string, path: string, body?: string): Promise<Exchange> {
  const start = performance.now();
  const operation = `${method} ${path}`;

  try {
    const response = await fetch(`${BASE_URL}${path}`, {
      method,
      headers: body !== undefined ? { 'Content-Type': 'text/plain' } : undefined,
      body,
      redirect: 'manual',
    });
    const text = await response.text();

    return {
      result: {
        operation,
        success: response.status < 400,
        duration: performance.now() - start,
        statusCode: response.status,
      },
      text,
      location: response.headers.get('location'),
    };
  } catch {
    return {
      result: { operation, success: false, duration: performance.now() - start },
      text: '',
      location: null,
    };
  }
}

async function shortenAndResolve(index: number): Promise<void> {
  const longUrl = `https://example.com/load/${Date.now()}/${index}?sig=${index.toString(16)}`;

  const created = await makeRequest('POST', '/', longUrl);
  results.push(created.result);
  if (created.result.statusCode !== 200) {
    return;
  }

  const shortId = created.text.trim().split('/').pop() ?? '';
  const redirect = await makeRequest('GET', `/${shortId}`);
  results.push(redirect.result);

  if (redirect.result.statusCode !== 301 || redirect.location !== longUrl) {
    mismatches++;
  }
}

function printStats(): void {
  const successful = results.filter((r) => r.success);
  const failed = results.filter((r) => !r.success);
  const sorted = results.map((r) => r.duration).sort((a, b) => a - b);

  if (sorted.length === 0) {
    console.log('No requests were made.');
    return;
  }

  const avg = sorted.reduce((a, b) => a + b, 0) / sorted.length;
  const p50 = sorted[Math.floor(sorted.length * 0.5)];
  const p95 = sorted[Math.floor(sorted.length * 0.95)];
  const p99 = sorted[Math.floor(sorted.length * 0.99)];

  console.log('\n========================================');
  console.log('           LOAD TEST RESULTS           ');
  console.log('========================================');
  console.log(`Total Requests:  ${results.length}`);
  console.log(`Successful:      ${successful.length} (${((successful.length / results.length) * 100).toFixed(1)}%)`);
  console.log(`Failed:          ${failed.length}`);
  console.log(`Bad redirects:   ${mismatches}`);
  console.log('');
  console.log('Response Times (ms):');
  console.log(`  Min:    ${sorted[0].toFixed(2)}`);
  console.log(`  Avg:    ${avg.toFixed(2)}`);
  console.log(`  P50:    ${p50.toFixed(2)}`);
  console.log(`  P95:    ${p95.toFixed(2)}`);
  console.log(`  P99:    ${p99.toFixed(2)}`);
  console.log(`  Max:    ${sorted[sorted.length - 1].toFixed(2)}`);
  console.log('');

  // Group by method
  const byOperation: Record<string, TestResult[]> = {};
  for (const r of results) {
    const op = r.operation.split(' ')[0];
    (byOperation[op] ??= []).push(r);
  }

  console.log('By Operation:');
  for (const [op, opResults] of Object.entries(byOperation)) {
    const opAvg = opResults.reduce((a, r) => a + r.duration, 0) / opResults.length;
    const opSuccess = opResults.filter((r) => r.success).length;
    console.log(`  ${op.padEnd(6)} - ${opResults.length} requests, ${opAvg.toFixed(2)}ms avg, ${opSuccess} success`);
  }

  console.log('========================================\n');
}

async function main(): Promise<void> {
  console.log('URL Shortener Load Test');
  console.log(`Base URL: ${BASE_URL}`);
  console.log(`Total Requests: ${TOTAL_REQUESTS}`);
  console.log(`Concurrency: ${CONCURRENCY}`);
  console.log('');

  console.log('Checking server...');
  const banner = await makeRequest('GET', '/');
  if (banner.result.statusCode !== 200) {
    console.error('Server is not reachable. Aborting.');
    process.exit(1);
  }
  console.log('Server is up. Starting load test...\n');

  const startTime = performance.now();
  const batches = Math.ceil(TOTAL_REQUESTS / CONCURRENCY);

  for (let i = 0; i < batches; i++) {
    const batchSize = Math.min(CONCURRENCY, TOTAL_REQUESTS - i * CONCURRENCY);
    process.stdout.write(`\rBatch ${i + 1}/${batches} (${batchSize} concurrent)...`);
    await Promise.all(Array.from({ length: batchSize }, (_, j) => shortenAndResolve(i * CONCURRENCY + j)));
  }

  const totalTime = performance.now() - startTime;
  console.log(`\n\nCompleted in ${(totalTime / 1000).toFixed(2)}s`);
  console.log(`Throughput: ${(results.length / (totalTime / 1000)).toFixed(2)} req/s`);

  printStats();
  process.exitCode = mismatches > 0 ? 1 : 0;
}

main().catch((error: unknown) => {
  console.error(error);
  process.exit(1);
});
