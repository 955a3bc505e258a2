import type { Command } from 'commander'
import { runTree } from '../../commands/tree.js'
import { runLisp } from '../../commands/lisp.js'

export function registerTree(program: Command): void {
	program
		.command('tree')
		.argument('<input>', 'Collector payload (layout JSON or AX node list), or - for stdin')
		.description('Build a canonical ui_tree.json from an accessibility snapshot')
		.option('--out <file>', 'Write the document to a file instead of stdout')
		.option('--screen <WxH>', 'Screen size when the payload reports no viewport (default: 1920x1080)')
		.option('--json', 'With --out, print a JSON summary')
		.option('-q, --quiet', 'Suppress progress lines')
		.addHelpText(
			'after',
			'\nExamples:\n  $ uiground tree layout.json --out captures/home/ui_tree.json\n  $ uiground tree - < layout.json\n  $ uiground tree nodes.json --screen 1280x720\n',
		)
		.action(async (input, options) => {
			await runTree(input, options)
		})

	program
		.command('lisp')
		.argument('<input>', 'ui_tree.json or collector payload, or - for stdin')
		.description('Render a ui tree as S-expressions')
		.option('--no-bounds', 'Omit [x,y wxh] bounds')
		.option('--no-states', 'Omit :state flags')
		.option('--compact', 'Single line, no header')
		.option('--no-empty', 'Skip nodes with no name and no children')
		.option('--max-depth <n>', 'Skip nodes deeper than n (root is 0)')
		.option('--min-size <px>', 'Skip nodes narrower and shorter than px')
		.option('--screen <WxH>', 'Screen size when the payload reports no viewport (default: 1920x1080)')
		.option('--out <file>', 'Write to a file instead of stdout')
		.addHelpText(
			'after',
			'\nExamples:\n  $ uiground lisp captures/home/ui_tree.json\n  $ uiground lisp ui_tree.json --compact --no-bounds\n  $ uiground lisp ui_tree.json --max-depth 3 --min-size 4\n',
		)
		.action(async (input, options) => {
			await runLisp(input, options)
		})
}
