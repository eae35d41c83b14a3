import React, { useCallback, useEffect, useState } from "react"
import { Box, Text, useInput } from "ink"
import type { ChatSessionController } from "../../chat/controller.js"
import { keyToEvent } from "../../chat/keymap.js"
import type { ChatState } from "../../chat/types.js"
import { useTerminalSize } from "../hooks/useTerminalSize.js"
import { CURSOR_BLINK_MS, useBlinkTicker } from "../hooks/useBlinkTicker.js"

export interface ChatScreenProps {
  readonly controller: ChatSessionController
  readonly blinkIntervalMs?: number
}

export const ChatScreen: React.FC<ChatScreenProps> = ({ controller, blinkIntervalMs = CURSOR_BLINK_MS }) => {
  const [state, setState] = useState<ChatState>(() => controller.getState())
  const { columns, rows } = useTerminalSize()

  useEffect(() => controller.onChange(setState), [controller])

  useEffect(() => {
    void controller.dispatch({ type: "resize", width: columns, height: rows })
  }, [controller, columns, rows])

  const tick = useCallback(() => {
    void controller.dispatch({ type: "timerTick" })
  }, [controller])
  useBlinkTicker(tick, blinkIntervalMs)

  useInput(
    (input, key) => {
      void controller.dispatch(keyToEvent(input, key))
    },
    { isActive: !state.exited },
  )

  return (
    <Box flexDirection="column" width={columns}>
      {state.viewportLines.map((line, index) => (
        <Text key={`vp-${index}`} wrap="truncate-end">
          {line || " "}
        </Text>
      ))}
      <Text> </Text>
      <Text wrap="truncate-end">{state.inputLine}</Text>
    </Box>
  )
}
