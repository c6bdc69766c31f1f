import { useReducer, useRef } from 'react';

import {
  INITIAL_CALCULATOR_STATE,
  calculatorReducer,
  clearLabel,
  type CalculatorKey,
  type CalculatorState,
} from '../lib/calculator';

const ROWS: CalculatorKey[][] = [
  ['clear', 'negate', 'percent', '÷'],
  ['7', '8', '9', '×'],
  ['4', '5', '6', '−'],
  ['1', '2', '3', '+'],
  ['0', '.', '='],
];

const SWIPE_THRESHOLD_PX = 10;

function keyLabel(key: CalculatorKey, state: CalculatorState) {
  if (key === 'clear') return clearLabel(state);
  if (key === 'negate') return '+/-';
  if (key === 'percent') return '%';
  return key;
}

function keyTone(key: CalculatorKey, state: CalculatorState) {
  if (key === '÷' || key === '×' || key === '−' || key === '+' || key === '=') {
    return state.activeOperator === key ? 'bg-white text-orange-500' : 'bg-orange-500 text-white';
  }
  if (key === 'clear' || key === 'negate' || key === 'percent') {
    return 'bg-[#a5a5a5] text-black';
  }
  return 'bg-[#333333] text-white';
}

export function CalculatorPage() {
  const [state, press] = useReducer(calculatorReducer, INITIAL_CALCULATOR_STATE);
  const swipeStartRef = useRef<number | null>(null);

  return (
    <main className="flex h-full flex-col justify-end gap-3 bg-black px-3 pb-3">
      <output
        aria-label="Display"
        className="block truncate px-5 text-right text-[5rem] font-light leading-none text-white"
        onPointerDown={(event) => {
          swipeStartRef.current = event.clientX;
        }}
        onPointerUp={(event) => {
          const start = swipeStartRef.current;
          swipeStartRef.current = null;
          if (start !== null && Math.abs(event.clientX - start) > SWIPE_THRESHOLD_PX) {
            press('backspace');
          }
        }}
      >
        {state.display}
      </output>
      {ROWS.map((row) => (
        <div key={row.join('')} className="grid grid-cols-4 gap-3">
          {row.map((key) => (
            <button
              key={key}
              type="button"
              onClick={() => press(key)}
              className={`aspect-square rounded-full text-3xl font-medium ${keyTone(key, state)} ${
                key === '0' ? 'col-span-2 aspect-auto pl-8 text-left' : ''
              }`}
            >
              {keyLabel(key, state)}
            </button>
          ))}
        </div>
      ))}
    </main>
  );
}
