// eslint.config.mts
// @ts-check
import eslint from "@eslint/js";
import eslintCommentsConfigs from "@eslint-community/eslint-plugin-eslint-comments/configs";
import vitest from "@vitest/eslint-plugin";
import { defineConfig } from "eslint/config";
import globals from "globals";
import tseslint from "typescript-eslint";

export default defineConfig(
	eslint.configs.recommended,
	tseslint.configs.strictTypeChecked,
	eslintCommentsConfigs.recommended,
	{
		languageOptions: {
			parser: tseslint.parser,
			globals: { ...globals.node },
			parserOptions: {
				projectService: true,
				tsconfigRootDir: import.meta.dirname,
			},
		},
		files: ["**/*.ts"],
		rules: {
			complexity: ["error", 8],
			"max-lines-per-function": [
				"error",
				{ max: 50, skipBlankLines: true, skipComments: true },
			],
			"max-params": ["error", 5],
			"max-depth": ["error", 4],
			"max-lines": [
				"error",
				{ max: 300, skipBlankLines: true, skipComments: true },
			],
			"@typescript-eslint/restrict-template-expressions": [
				"error",
				{
					allowNumber: true,
					allowBoolean: true,
					allowNullish: false,
					allowAny: false,
					allowRegExp: false,
				},
			],
			"@typescript-eslint/ban-ts-comment": [
				"error",
				{
					"ts-ignore": true,
					"ts-nocheck": true,
					"ts-expect-error": true,
					"ts-check": true,
				},
			],
			"@eslint-community/eslint-comments/no-use": "error",
			"@eslint-community/eslint-comments/no-unlimited-disable": "error",
			"@eslint-community/eslint-comments/disable-enable-pair": "error",
			"@eslint-community/eslint-comments/no-unused-disable": "error",
			"@typescript-eslint/only-throw-error": [
				"error",
				{ allowThrowingUnknown: false, allowThrowingAny: false },
			],
		},
	},
	{
		files: ["src/**/*.ts"],
		rules: {
			"no-restricted-syntax": [
				"error",
				{
					selector: "SwitchStatement",
					message: "Switch statements are forbidden. Use ts-pattern match() instead.",
				},
				{
					selector: "ThrowStatement",
					message: "Errors are values in src/. Return Either.left / Effect.fail instead.",
				},
				{
					selector:
						"FunctionDeclaration[async=true], FunctionExpression[async=true], ArrowFunctionExpression[async=true]",
					message: "async/await is forbidden in src/. Use Effect.gen / Effect.async.",
				},
				{
					selector: "NewExpression[callee.name='Promise']",
					message: "new Promise is forbidden. Use Effect.async.",
				},
			],
		},
	},
	{
		files: ["test/**/*.ts"],
		...vitest.configs.all,
		rules: {
			...vitest.configs.all.rules,
			"max-lines-per-function": "off",
			"vitest/prefer-expect-assertions": "off",
			"vitest/no-hooks": "off",
		},
	},
	{ ignores: ["dist/**", "coverage/**"] },
);
