// Presigned-style URL with encoded query parameters; placeholder values only
export const SIGNED_URL =
  'https://test-bucket.s3.us-west-2.amazonaws.com/code-results/1700000000-run.txt' +
  '?X-Amz-Algorithm=AWS4-HMAC-SHA256' +
  '&X-Amz-Credential=TESTKEY%2F20240101%2Fus-west-2%2Fs3%2Faws4_request' +
  '&X-Amz-Date=20240101T000000Z&X-Amz-Expires=86400&X-Amz-SignedHeaders=host' +
  '&X-Amz-Signature=' +
  '0123456789abcdef'.repeat(4);
