// 超时包装：到时 reject，底层请求不取消（结果被丢弃）

export class TimeoutError extends Error {
  constructor(label: string, ms: number) {
    super(`${label} 超时 (${ms}ms)`);
    this.name = "TimeoutError";
  }
}


export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, ms)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
