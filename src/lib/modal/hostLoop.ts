/**
 * Cooperative host loop
 *
 * WHY: The host runtime delivers every callback on one dispatch thread. Modeling that thread
 * as an explicit FIFO with a reentrant pump lets a modal wait service events (including the
 * callback that ends the wait) without depending on a specific runtime's loop internals.
 * INVARIANT: Tasks run in post order, one at a time, at whatever frame depth is current.
 * INVARIANT: A frame only stops pumping after quit() has been requested on it; quitting an
 * outer frame from inside an inner one takes effect once the inner frame unwinds.
 */

import { ScreenError, ScreenErrorCode } from '../errors';

export type HostTask = {
  readonly id: number;
  readonly label: string;
  readonly run: () => void;
};

export class LoopFrame {
  readonly depth: number;
  private quitRequested = false;

  constructor(depth: number) {
    this.depth = depth;
  }

  quit(): void {
    this.quitRequested = true;
  }

  get isQuitRequested(): boolean {
    return this.quitRequested;
  }
}

export class HostLoop {
  private readonly queue: HostTask[] = [];
  private readonly frames: LoopFrame[] = [];
  private nextTaskId = 1;
  private serviced = 0;

  post(run: () => void, label = 'task'): number {
    const id = this.nextTaskId++;
    this.queue.push({ id, label, run });
    return id;
  }

  cancel(taskId: number): boolean {
    const index = this.queue.findIndex((task) => task.id === taskId);
    if (index < 0) return false;
    this.queue.splice(index, 1);
    return true;
  }

  get pending(): number {
    return this.queue.length;
  }

  get nestingDepth(): number {
    return this.frames.length;
  }

  get servicedCount(): number {
    return this.serviced;
  }

  /** Top-level drain: runs tasks (including ones posted meanwhile) until the queue is empty. */
  runPending(): number {
    let count = 0;
    let task = this.queue.shift();
    while (task) {
      this.runTask(task);
      count += 1;
      task = this.queue.shift();
    }
    return count;
  }

  enterFrame(): LoopFrame {
    return new LoopFrame(this.frames.length + 1);
  }

  /**
   * Reenters the loop until `frame.quit()` is called from one of the serviced tasks.
   * A task that throws unwinds the frame and the error reaches the waiting caller.
   */
  pump(frame: LoopFrame): number {
    this.frames.push(frame);
    let count = 0;
    try {
      while (!frame.isQuitRequested) {
        const task = this.queue.shift();
        if (!task) {
          // Nothing else can post while this thread is busy pumping, so the wait can never end.
          throw new ScreenError(
            ScreenErrorCode.ModalStalled,
            'Host loop idle while a modal frame is still waiting for completion',
            `depth=${frame.depth}`,
          );
        }
        this.runTask(task);
        count += 1;
      }
    } finally {
      const index = this.frames.lastIndexOf(frame);
      if (index >= 0) this.frames.splice(index, 1);
    }
    return count;
  }

  private runTask(task: HostTask): void {
    this.serviced += 1;
    task.run();
  }
}
