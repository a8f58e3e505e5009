import test from 'ava'
import {formatCommand} from '../executor.js'

test('formatCommand: plain arguments are joined with spaces', t => {
  t.is(formatCommand({file: 'apt-get', args: ['install', '-y', 'jq']}), 'apt-get install -y jq')
})

test('formatCommand: prefixes sudo when requested', t => {
  t.is(formatCommand({file: 'apt-get', args: ['update', '-y'], sudo: true}), 'sudo apt-get update -y')
})

test('formatCommand: quotes arguments with spaces or shell characters', t => {
  t.is(
    formatCommand({file: 'ssh-keygen', args: ['-N', '', '-C', 'my key']}),
    'ssh-keygen -N "" -C "my key"'
  )
  t.is(formatCommand({file: 'echo', args: ['$HOME']}), 'echo "$HOME"')
})
