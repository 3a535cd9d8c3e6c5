// Keep CLI usage text in one editable module.
export const CLI_USAGE_TEXT = `llmrun - Run and track local llama.cpp servers

Usage:
  llmrun <model> [flags...]        Run a model in the foreground
  llmrun start <model> [flags...]  Launch a model detached (daemon mode)
  llmrun stop <model>              Stop a tracked server
  llmrun stop --all                Stop every tracked server
  llmrun status [--json]           Show running and recently stopped servers
  llmrun info <model> [--kv|--raw] Show metadata captured from the last run
  llmrun list                      List models in models_dir, newest first
  llmrun config                    Show the config file location
  llmrun doctor                    Check config, paths and runtime files
  llmrun clear-history             Forget past runs
  llmrun rebuild                   Rebuild llama.cpp from llama_cpp_source_dir
  llmrun mcp                       Serve server status to agents over MCP (stdio)
  llmrun help                      Show this help message

Model names may be any unique fragment of a .gguf file name.
Flags after the model name are passed to llama-server and override config defaults.

Examples:
  llmrun mistral                   Run the model whose name contains "mistral"
  llmrun codellama --port 9090     Override the default port
  llmrun start qwen -c 8192        Launch detached with a larger context
  llmrun info mistral --kv         List every parsed metadata key
`;
