import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { type AnalysisResult, analyze, printTree } from '@javalite/analyzer'
import {
	formatAnalysisError,
	formatReadError,
	renderDiagnostics,
	summarize,
	TOKEN_COLUMNS,
	tokenRows,
	VARIABLE_COLUMNS,
	variableRows,
} from '../utils.ts'

export default class CheckCommand extends BaseCommand {
	static override commandName = 'check'
	static override description = 'Check a Javalite source file for scope and type errors'

	@args.string({ description: 'Source file to check' })
	declare input: string

	@flags.boolean({ description: 'Print the token table' })
	declare tokens: boolean

	@flags.boolean({ description: 'Print every declared variable and whether it is used' })
	declare variables: boolean

	@flags.boolean({ description: 'Print the syntax tree' })
	declare ast: boolean

	@flags.boolean({
		default: true,
		description: 'Run the type checker (use --no-typecheck to skip it)',
		showNegatedVariantInHelp: true,
	})
	declare typecheck: boolean

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.input, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.input, error))
			this.exitCode = 1
			return null
		}
	}

	private analyzeSource(source: string): AnalysisResult | null {
		try {
			return analyze(source, { filename: this.input, typeCheck: this.typecheck })
		} catch (error: unknown) {
			this.logger.error(formatAnalysisError(error))
			this.exitCode = 1
			return null
		}
	}

	private printTable(columns: string[], rows: string[][]): void {
		const table = this.ui.table()
		table.head(columns)
		for (const row of rows) {
			table.row(row)
		}
		table.render()
	}

	private printReports(result: AnalysisResult): void {
		if (this.tokens) {
			this.printTable(TOKEN_COLUMNS, tokenRows(result.symbols.getTokens()))
		}
		if (this.ast && result.program !== undefined) {
			this.logger.log(printTree(result.program))
		}
		if (this.variables) {
			this.printTable(VARIABLE_COLUMNS, variableRows(result.symbols.getDeclaredVariables()))
		}
	}

	private printDiagnostics(result: AnalysisResult, source: string): void {
		const { filename } = result
		const errors = result.failure === undefined ? result.errors : [result.failure]
		for (const text of renderDiagnostics(errors, source, filename)) {
			this.logger.error(text)
		}
		for (const text of renderDiagnostics([...result.warnings, ...result.unusedVariables], source, filename)) {
			this.logger.warning(text)
		}
	}

	override async run(): Promise<void> {
		const source = await this.readSourceFile()
		if (source === null) return

		const result = this.analyzeSource(source)
		if (result === null) return

		this.printReports(result)
		this.printDiagnostics(result, source)

		if (!result.succeeded) {
			this.logger.error(summarize(result))
			this.exitCode = 1
			return
		}
		this.logger.success(summarize(result))
	}
}
