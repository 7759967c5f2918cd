/**
 * 生成只含一个 raw block 的 zstd 帧，用于构造基础词典测试数据
 */

const ZSTD_MAGIC = 0xfd2fb528;
// Single_Segment_flag = 1, Frame_Content_Size 占 4 字节
const FRAME_HEADER_DESCRIPTOR = 0xa0;
const MAX_RAW_BLOCK_SIZE = 128 * 1024;

export function zstdRawFrame(text: string): Buffer {
  const payload = Buffer.from(text, 'utf-8');
  if (payload.length === 0 || payload.length > MAX_RAW_BLOCK_SIZE) {
    throw new Error(`payload size out of range: ${payload.length}`);
  }

  const header = Buffer.alloc(9);
  header.writeUInt32LE(ZSTD_MAGIC, 0);
  header.writeUInt8(FRAME_HEADER_DESCRIPTOR, 4);
  header.writeUInt32LE(payload.length, 5);

  // Last_Block = 1, Block_Type = Raw(0)
  const blockHeaderValue = 1 | (payload.length << 3);
  const blockHeader = Buffer.from([
    blockHeaderValue & 0xff,
    (blockHeaderValue >> 8) & 0xff,
    (blockHeaderValue >> 16) & 0xff,
  ]);

  return Buffer.concat([header, blockHeader, payload]);
}
