export const VIP_CONDITIONS = `
version: 1
settings:
  log_level: silent
  cache_size: 16
placeholders:
  rank: gold
  level: 12
conditions:
  vip:
    description: Gold members above level ten
    all:
      - "%rank% == gold"
      - "%level% >= 10"
  open:
    all: []
`;

export const BROKEN_CONDITIONS = `
version: 1
settings:
  log_level: silent
conditions:
  broken:
    all:
      - "1 > 0"
      - "a = b"
      - "(x == y"
  fine:
    all:
      - "x == x"
`;
