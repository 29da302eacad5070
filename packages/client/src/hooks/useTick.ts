import { useState, useEffect } from 'react';

const TICK_MS = 5000;

let now = Date.now();
const subscribers = new Set<(time: number) => void>();
let intervalId: ReturnType<typeof setInterval> | null = null;

function startTimer() {
  if (intervalId) return;
  intervalId = setInterval(() => {
    now = Date.now();
    subscribers.forEach((callback) => callback(now));
  }, TICK_MS);
}

function stopTimer() {
  if (intervalId && subscribers.size === 0) {
    clearInterval(intervalId);
    intervalId = null;
  }
}

/**
 * Current time, refreshed every 5 seconds.
 * All components using this hook share a single interval.
 */
export function useTick(): number {
  const [time, setTime] = useState(() => Date.now());

  useEffect(() => {
    subscribers.add(setTime);
    startTimer();

    return () => {
      subscribers.delete(setTime);
      stopTimer();
    };
  }, []);

  return time;
}
