export type RetryOptions = {
  maxRetries?: number;
  baseDelay?: number;
  label?: string;
};

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { maxRetries = 1, baseDelay = 1000, label = 'Retry' } = options;
  let lastError: Error = new Error('withRetry: no attempt made');

  for (let attempt = 0; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err) {
      lastError = err instanceof Error ? err : new Error(String(err));
      if (attempt < maxRetries) {
        const wait = baseDelay * Math.pow(2, attempt) + Math.random() * baseDelay;
        console.log(`[${label}] Retry ${attempt + 1}/${maxRetries} after ${Math.round(wait)}ms: ${lastError.message}`);
        await delay(wait);
      }
    }
  }

  throw lastError;
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
