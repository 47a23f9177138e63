/**
 * Trailing-edge throttle: the first value in a quiet period opens a window,
 * and when it closes only the most recent value is rendered.
 */
export class RenderThrottle<T> {
  private latest: { value: T } | null = null;
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private windowMs: number,
    private render: (value: T) => void
  ) {}

  push(value: T): void {
    this.latest = { value };
    if (this.timer) return;
    this.timer = setTimeout(() => this.flush(), this.windowMs);
  }

  isPending(): boolean {
    return this.timer !== null;
  }

  cancel(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
    this.latest = null;
  }

  private flush(): void {
    this.timer = null;
    const latest = this.latest;
    this.latest = null;
    if (latest) {
      this.render(latest.value);
    }
  }
}
