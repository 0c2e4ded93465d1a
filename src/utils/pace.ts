// 礼貌间隔：同一轮内相邻两次回源之间至少间隔 delayMs

import { setTimeout as sleep } from "node:timers/promises";


export interface Pacer {
  /** 每次回源前调用；首次立即返回 */
  wait(): Promise<void>;
}


export function createPacer(delayMs: number): Pacer {
  let started = false;
  return {
    async wait() {
      if (started && delayMs > 0) await sleep(delayMs);
      started = true;
    },
  };
}
