/**
 * bpfledger — Kernel BPF constants
 *
 * enum bpf_prog_type from include/uapi/linux/bpf.h; the array index is the
 * numeric value the kernel reports.
 */

export const BPF_PROG_TYPE_NAMES = [
  'BPF_PROG_TYPE_UNSPEC',
  'BPF_PROG_TYPE_SOCKET_FILTER',
  'BPF_PROG_TYPE_KPROBE',
  'BPF_PROG_TYPE_SCHED_CLS',
  'BPF_PROG_TYPE_SCHED_ACT',
  'BPF_PROG_TYPE_TRACEPOINT',
  'BPF_PROG_TYPE_XDP',
  'BPF_PROG_TYPE_PERF_EVENT',
  'BPF_PROG_TYPE_CGROUP_SKB',
  'BPF_PROG_TYPE_CGROUP_SOCK',
  'BPF_PROG_TYPE_LWT_IN',
  'BPF_PROG_TYPE_LWT_OUT',
  'BPF_PROG_TYPE_LWT_XMIT',
  'BPF_PROG_TYPE_SOCK_OPS',
  'BPF_PROG_TYPE_SK_SKB',
  'BPF_PROG_TYPE_CGROUP_DEVICE',
  'BPF_PROG_TYPE_SK_MSG',
  'BPF_PROG_TYPE_RAW_TRACEPOINT',
  'BPF_PROG_TYPE_CGROUP_SOCK_ADDR',
  'BPF_PROG_TYPE_LWT_SEG6LOCAL',
  'BPF_PROG_TYPE_LIRC_MODE2',
  'BPF_PROG_TYPE_SK_REUSEPORT',
  'BPF_PROG_TYPE_FLOW_DISSECTOR',
  'BPF_PROG_TYPE_CGROUP_SYSCTL',
  'BPF_PROG_TYPE_RAW_TRACEPOINT_WRITABLE',
  'BPF_PROG_TYPE_CGROUP_SOCKOPT',
  'BPF_PROG_TYPE_TRACING',
  'BPF_PROG_TYPE_STRUCT_OPS',
  'BPF_PROG_TYPE_EXT',
  'BPF_PROG_TYPE_LSM',
  'BPF_PROG_TYPE_SK_LOOKUP',
  'BPF_PROG_TYPE_SYSCALL',
  'BPF_PROG_TYPE_NETFILTER',
] as const;

/** `BPF_PROG_TYPE_*` name for a numeric program type, or `Unknown`. */
export function progTypeName(value: number): string {
  return BPF_PROG_TYPE_NAMES[value] ?? 'Unknown';
}

/**
 * Numeric program type for a bpftool type string (`xdp`, `sched_cls`, ...).
 * Returns undefined for names the table does not know.
 */
export function progTypeFromBpftool(type: string): number | undefined {
  const index = BPF_PROG_TYPE_NAMES.findIndex(
    (name) => name === `BPF_PROG_TYPE_${type.toUpperCase()}`,
  );
  return index >= 0 ? index : undefined;
}
