let _debug = 5;

export function level(l: number) {
  _debug = l;
}

// stdout carries script output, so everything here goes to stderr
export function xdebug(level: number, ...msg: unknown[]) {
  if (_debug>=level) { console.error(Date.now() + `  DEBUG[${level}] `,...msg) }
}

export function error(...msg: unknown[]) {
  console.error(Date.now() + '  [!] ',...msg);
}
