import test from 'ava'
import {expandHome, firstLine, formatDuration} from '../utils.js'

test('formatDuration: milliseconds, seconds, minutes', t => {
  t.is(formatDuration(850), '850ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(125_000), '2m 5s')
})

test('expandHome: expands ~ and ~/ only', t => {
  t.is(expandHome('~', '/home/tester'), '/home/tester')
  t.is(expandHome('~/.ssh/key', '/home/tester'), '/home/tester/.ssh/key')
  t.is(expandHome('/etc/hosts', '/home/tester'), '/etc/hosts')
  t.is(expandHome('~other/file', '/home/tester'), '~other/file')
})

test('firstLine: skips blank lines and trims', t => {
  t.is(firstLine('\n  Python 3.10.12  \nmore'), 'Python 3.10.12')
  t.is(firstLine(''), '')
})
