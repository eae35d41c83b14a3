import { useEffect, useState } from "react"
import { useStdout } from "ink"

export interface TerminalSize {
  readonly columns: number
  readonly rows: number
}

const DEFAULT_COLUMNS = 80
const DEFAULT_ROWS = 24

export const useTerminalSize = (): TerminalSize => {
  const { stdout } = useStdout()
  const [size, setSize] = useState<TerminalSize>(() => ({
    columns: stdout.columns || DEFAULT_COLUMNS,
    rows: stdout.rows || DEFAULT_ROWS,
  }))

  useEffect(() => {
    const onResize = () => setSize({ columns: stdout.columns || DEFAULT_COLUMNS, rows: stdout.rows || DEFAULT_ROWS })
    stdout.on("resize", onResize)
    return () => {
      stdout.off("resize", onResize)
    }
  }, [stdout])

  return size
}
