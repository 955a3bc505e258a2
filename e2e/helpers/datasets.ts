import fs from 'node:fs/promises'
import path from 'node:path'

/** A tiny stand-in for a PNG; the pipeline never decodes screenshots. */
export const FAKE_PNG = Buffer.from([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a])

/** Collector payload: a page with a visible button, an offscreen link and a button under a dialog. */
export const layoutPayload = () => ({
	tabs: [
		{
			url: 'http://localhost:3000/',
			title: 'Fixture',
			layout: {
				viewport: { visualViewport: { width: 1280, height: 720 } },
				nodes: [
					{ nodeId: '1', role: { type: 'role', value: 'RootWebArea' }, name: { value: 'Fixture' }, childIds: ['2', '3', '4', '5'], bounds: { x: 0, y: 0, width: 1280, height: 720 } },
					{ nodeId: '2', role: { value: 'button' }, name: { value: 'Save' }, bounds: { x: 10, y: 10, width: 80, height: 30 } },
					{ nodeId: '3', role: { value: 'link' }, name: { value: 'Far' }, bounds: { x: 1400, y: 10, width: 80, height: 30 } },
					{ nodeId: '4', role: { value: 'button' }, name: { value: 'Covered' }, bounds: { x: 300, y: 300, width: 100, height: 40 } },
					{ nodeId: '5', role: { value: 'dialog' }, name: { value: 'Modal' }, childIds: ['6'], bounds: { x: 200, y: 200, width: 400, height: 300 } },
					{ nodeId: '6', role: { value: 'Gizmo' }, name: { value: 'Thing' }, bounds: { x: 210, y: 210, width: 20, height: 20 } },
				],
			},
		},
	],
})

/** ui_tree.json document with one visible button. */
export const uiTreeDocument = (name: string) => ({
	timestamp: '2026-01-02T03:04:05.000Z',
	screen: { width: 800, height: 600 },
	root: {
		id: 'node_0',
		role: 'desktop',
		name: '',
		bounds: { x: 0, y: 0, width: 800, height: 600 },
		children: [{ id: 'node_1', role: 'button', name, bounds: { x: 100, y: 100, width: 100, height: 50 } }],
	},
})

export const emptyUiTreeDocument = () => ({
	timestamp: '2026-01-02T03:04:05.000Z',
	screen: { width: 800, height: 600 },
	root: { id: 'node_0', role: 'desktop', name: '', bounds: { x: 0, y: 0, width: 800, height: 600 } },
})

export const writeCapture = async (root: string, name: string, files: { uiTree?: unknown; rawUiTree?: string; screenshot?: boolean }): Promise<string> => {
	const dir = path.join(root, name)
	await fs.mkdir(dir, { recursive: true })
	if (files.uiTree !== undefined) {
		await fs.writeFile(path.join(dir, 'ui_tree.json'), JSON.stringify(files.uiTree))
	}
	if (files.rawUiTree !== undefined) {
		await fs.writeFile(path.join(dir, 'ui_tree.json'), files.rawUiTree)
	}
	if (files.screenshot) {
		await fs.writeFile(path.join(dir, 'screenshot_cropped.png'), FAKE_PNG)
	}
	return dir
}

export const readJson = async (filePath: string): Promise<unknown> => JSON.parse(await fs.readFile(filePath, 'utf8'))
