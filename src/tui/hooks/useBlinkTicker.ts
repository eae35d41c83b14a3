import { useEffect, useRef } from "react"

export const CURSOR_BLINK_MS = 530

/** Calls `onTick` every `intervalMs`; an interval of 0 or less disables the timer. */
export const useBlinkTicker = (onTick: () => void, intervalMs = CURSOR_BLINK_MS): void => {
  const tickRef = useRef(onTick)

  useEffect(() => {
    tickRef.current = onTick
  }, [onTick])

  useEffect(() => {
    if (intervalMs <= 0) return
    const timer = setInterval(() => tickRef.current(), intervalMs)
    return () => clearInterval(timer)
  }, [intervalMs])
}
