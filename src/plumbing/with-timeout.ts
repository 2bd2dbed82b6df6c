/**
 * Race a task against a deadline. The timer is always cleared so a settled
 * task never keeps the event loop alive.
 */
export const withTimeout = async <T>(
  task: Promise<T>,
  timeoutMs: number,
  onTimeout: () => Error,
): Promise<T> => {
  let timer: NodeJS.Timeout | undefined

  const deadline = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => {
      reject(onTimeout())
    }, timeoutMs)
  })

  try {
    return await Promise.race([task, deadline])
  } finally {
    clearTimeout(timer)
  }
}
