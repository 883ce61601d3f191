const FRAMES = ["⠋", "⠙", "⠹", "⠸", "⠼", "⠴", "⠦", "⠧", "⠇", "⠏"];

/** Terminal spinner on stderr; silent when stderr is not a TTY. */
export class Spinner {
  private timer: NodeJS.Timeout | null = null;
  private frame = 0;

  constructor(private stream: NodeJS.WriteStream = process.stderr) {}

  start(label: string): void {
    if (!this.stream.isTTY || this.timer) return;
    this.timer = setInterval(() => {
      this.frame = (this.frame + 1) % FRAMES.length;
      this.stream.write(`\r${FRAMES[this.frame]} ${label}`);
    }, 80);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
    this.stream.write("\r\x1b[2K");
  }
}
