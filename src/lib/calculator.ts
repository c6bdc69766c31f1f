export type CalculatorOperator = '+' | '−' | '×' | '÷';
export type CalculatorDigit = '0' | '1' | '2' | '3' | '4' | '5' | '6' | '7' | '8' | '9';
export type CalculatorKey = CalculatorDigit | CalculatorOperator | '.' | '=' | 'clear' | 'negate' | 'percent' | 'backspace';

export type CalculatorState = {
  display: string;
  stored: number;
  operation: CalculatorOperator | null;
  typing: boolean;
  // Operator button drawn highlighted until the next digit arrives.
  activeOperator: CalculatorOperator | null;
};

export const INITIAL_CALCULATOR_STATE: CalculatorState = {
  display: '0',
  stored: 0,
  operation: null,
  typing: false,
  activeOperator: null,
};

const MAX_TYPED_LENGTH = 9;
const numberFormatter = new Intl.NumberFormat('en-US', { maximumFractionDigits: 8 });

function isOperator(key: CalculatorKey): key is CalculatorOperator {
  return key === '+' || key === '−' || key === '×' || key === '÷';
}

function parseDisplay(display: string) {
  const value = Number.parseFloat(display.replaceAll(',', ''));
  return Number.isFinite(value) ? value : 0;
}

export function formatCalculatorNumber(value: number) {
  return numberFormatter.format(value);
}

function apply(operation: CalculatorOperator, left: number, right: number) {
  switch (operation) {
    case '+':
      return left + right;
    case '−':
      return left - right;
    case '×':
      return left * right;
    case '÷':
      return right !== 0 ? left / right : 0;
  }
}

export function clearLabel(state: CalculatorState) {
  return state.display === '0' && !state.typing ? 'AC' : 'C';
}

export function calculatorReducer(state: CalculatorState, key: CalculatorKey): CalculatorState {
  if (isOperator(key)) {
    if (state.typing && state.operation) {
      const result = apply(state.operation, state.stored, parseDisplay(state.display));
      return {
        display: formatCalculatorNumber(result),
        stored: result,
        operation: key,
        typing: false,
        activeOperator: key,
      };
    }
    return {
      ...state,
      stored: parseDisplay(state.display),
      operation: key,
      typing: false,
      activeOperator: key,
    };
  }

  switch (key) {
    case 'clear':
      if (state.display !== '0' || state.typing) {
        // C keeps the pending operation when the second operand is being replaced.
        return state.activeOperator
          ? { ...state, display: '0', typing: false }
          : { ...state, display: '0', typing: false, operation: null, stored: 0 };
      }
      return INITIAL_CALCULATOR_STATE;
    case 'negate':
      return { ...state, display: formatCalculatorNumber(parseDisplay(state.display) * -1) };
    case 'percent':
      return { ...state, display: formatCalculatorNumber(parseDisplay(state.display) / 100) };
    case '=': {
      if (!state.operation) return state;
      const result = apply(state.operation, state.stored, parseDisplay(state.display));
      return {
        display: formatCalculatorNumber(result),
        stored: result,
        operation: null,
        typing: false,
        activeOperator: null,
      };
    }
    case '.':
      if (!state.typing) {
        return { ...state, display: '0.', typing: true, activeOperator: null };
      }
      return {
        ...state,
        display: state.display.includes('.') ? state.display : `${state.display}.`,
        activeOperator: null,
      };
    case 'backspace':
      if (!state.typing || state.display.length <= 1) {
        return { ...state, display: '0', typing: false };
      }
      return { ...state, display: state.display.slice(0, -1) };
    default:
      if (!state.typing) {
        return { ...state, display: key, typing: true, activeOperator: null };
      }
      return {
        ...state,
        display: state.display.length < MAX_TYPED_LENGTH ? `${state.display}${key}` : state.display,
        activeOperator: null,
      };
  }
}
