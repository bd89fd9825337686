import React, { useRef, useEffect } from 'react';
import { Box, Text, useInput } from 'ink';
import { colors } from '../theme/index.js';

/**
 * Props for the TextInput component.
 */
export interface TextInputProps {
  /** Current value of the input */
  value: string;
  /** Callback fired when the value changes */
  onChange: (value: string) => void;
  /** Callback fired with the value when Enter is pressed */
  onSubmit?: (value: string) => void;
  /** Text shown before the value */
  prompt?: string;
  /** Whether the input is focused and accepting input */
  focused?: boolean;
}

/** Cursor character displayed at the end of input text */
const CURSOR_CHAR = '▌';

/**
 * Single-line text input
 *
 * A controlled input with a prompt and a block cursor. Uses Ink's useInput
 * hook, so it needs a TTY on stdin.
 *
 * @example
 * ```tsx
 * const [value, setValue] = useState('');
 *
 * <TextInput value={value} onChange={setValue} onSubmit={submit} focused />
 * ```
 *
 * Layout:
 * ```
 * > 0 2▌
 * ```
 */
export const TextInput: React.FC<TextInputProps> = ({
  value,
  onChange,
  onSubmit,
  prompt = '> ',
  focused = false,
}) => {
  // Use refs to avoid stale closure issues in useInput callback
  const valueRef = useRef(value);
  const onChangeRef = useRef(onChange);
  const onSubmitRef = useRef(onSubmit);

  useEffect(() => {
    valueRef.current = value;
  }, [value]);

  useEffect(() => {
    onChangeRef.current = onChange;
  }, [onChange]);

  useEffect(() => {
    onSubmitRef.current = onSubmit;
  }, [onSubmit]);

  useInput(
    (input, key) => {
      if (key.return) {
        onSubmitRef.current?.(valueRef.current);
        return;
      }

      if (key.backspace || key.delete) {
        if (valueRef.current.length > 0) {
          const newValue = valueRef.current.slice(0, -1);
          valueRef.current = newValue; // Update immediately for fast typing
          onChangeRef.current(newValue);
        }
        return;
      }

      if (
        key.ctrl ||
        key.meta ||
        key.escape ||
        key.upArrow ||
        key.downArrow ||
        key.leftArrow ||
        key.rightArrow ||
        key.tab
      ) {
        return;
      }

      if (input && input.length > 0) {
        const newValue = valueRef.current + input;
        valueRef.current = newValue;
        onChangeRef.current(newValue);
      }
    },
    { isActive: focused }
  );

  return (
    <Box>
      <Text wrap="truncate">
        <Text color={focused ? colors.primary : colors.muted}>{prompt}</Text>
        <Text>{value}</Text>
        {focused && <Text color={colors.primary}>{CURSOR_CHAR}</Text>}
      </Text>
    </Box>
  );
};

export default TextInput;
