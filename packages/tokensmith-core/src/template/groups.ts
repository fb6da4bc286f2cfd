// Rewrites every capturing group of an already expanded pattern into a non-capturing one.
// Used where a pattern is repeated inside another and its captures would only be noise.
export function stripCaptures(source: string): string {
  let output = "";
  let inClass = false;

  for (let index = 0; index < source.length; index += 1) {
    const char = source[index] ?? "";

    if (char === "\\") {
      output += source.slice(index, index + 2);
      index += 1;
      continue;
    }

    if (inClass) {
      if (char === "]") {
        inClass = false;
      }
      output += char;
      continue;
    }

    if (char === "[") {
      inClass = true;
      output += char;
      continue;
    }

    if (char !== "(") {
      output += char;
      continue;
    }

    if (source[index + 1] !== "?") {
      output += "(?:";
      continue;
    }

    const named = /^\(\?<([A-Za-z_$][A-Za-z0-9_$]*)>/.exec(source.slice(index));
    if (named) {
      output += "(?:";
      index += named[0].length - 1;
      continue;
    }

    output += char;
  }

  return output;
}

/** True when the expanded pattern has a numeric back-reference outside character classes. */
export function hasBackReference(source: string): boolean {
  let inClass = false;

  for (let index = 0; index < source.length; index += 1) {
    const char = source[index];
    if (char === "\\") {
      if (!inClass && /[1-9]/.test(source[index + 1] ?? "")) {
        return true;
      }
      index += 1;
    } else if (char === "[") {
      inClass = true;
    } else if (char === "]") {
      inClass = false;
    }
  }

  return false;
}

// Keeps every capturing group (names dropped) and shifts group numbers and back-references by
// `offset`, so a copy of the pattern can sit after `offset` groups of another.
export function shiftGroups(source: string, offset: number): string {
  let output = "";
  let inClass = false;

  for (let index = 0; index < source.length; index += 1) {
    const char = source[index] ?? "";

    if (char === "\\") {
      const digits = inClass ? null : /^[1-9][0-9]*/.exec(source.slice(index + 1));
      if (digits) {
        output += `\\${Number(digits[0]) + offset}`;
        index += digits[0].length;
        continue;
      }
      output += source.slice(index, index + 2);
      index += 1;
      continue;
    }

    if (inClass) {
      if (char === "]") {
        inClass = false;
      }
      output += char;
      continue;
    }

    if (char === "[") {
      inClass = true;
      output += char;
      continue;
    }

    const named = char === "(" ? /^\(\?<([A-Za-z_$][A-Za-z0-9_$]*)>/.exec(source.slice(index)) : null;
    if (named) {
      output += "(";
      index += named[0].length - 1;
      continue;
    }

    output += char;
  }

  return output;
}
