import React, { useState, useEffect } from 'react';
import { Text } from 'ink';

const FRAMES = ['⠋', '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const FRAME_MS = 80;

interface SpinnerProps {
  label: string;
  color?: string;
}

/** Animated frame in front of a running model's progress text. */
export function Spinner({ label, color = 'cyan' }: SpinnerProps) {
  const [frame, setFrame] = useState(0);

  useEffect(() => {
    const timer = setInterval(() => setFrame((prev) => (prev + 1) % FRAMES.length), FRAME_MS);
    return () => clearInterval(timer);
  }, []);

  return (
    <Text color={color}>
      {FRAMES[frame]} {label}
    </Text>
  );
}
