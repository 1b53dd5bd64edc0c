import { APP_NAME } from './version'

export const USAGE = `Usage:
  ${APP_NAME} [[--text] | --binary] [<options>] [<file>]
  ${APP_NAME} --legend | --version | --help`

export const HELP = `${USAGE}

Shows control characters, escape sequences, whitespace, UTF-8 and binary
data as colored markers. Reads <file>, or stdin when it is "-" or absent.

Modes:
  -t, --text                 line by line, escapes annotated (default)
  -b, --binary               hex dump with the rendered bytes beside it
  -l, --legend               list every marker and exit
  -v, --version              print the version and exit
  -h, --help                 print this help and exit

Categories (lower case focuses, upper case ignores):
  -s, -S  whitespace          -c, -C  control characters
  -p, -P  printable           -e, -E  escape sequences
  -u, -U  UTF-8               -i, -I  binary
  (long forms: --focus-<name> / --ignore-<name>, with name one of
   space, control, printable, esc, utf8, binary)

Input:
  -L, --max-lines <n>        stop after <n> lines
  -B, --max-bytes <n>        stop after <n> bytes
  -f, --buffer <n>           read chunk size in bytes
  -d, --debug                debug trace on stderr, repeat for more (-dddd)

Text mode:
  -m, --marker <0-2>         marker details: 0 none, 1 brief, 2 full [default: 1]
      --no-separators        do not bracket escape sequences
      --no-line-numbers      do not print line numbers
      --no-color-markers     do not color SGR annotations in the style they set

Binary mode:
  -w, --columns <n>          bytes per row [default: fit the terminal]
  -D, --decode               decode UTF-8 sequences
      --decimal-offsets      print offsets in decimal
      --no-offsets           do not print offsets
`
